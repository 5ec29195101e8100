// src/legal-chat/dto/ask-question.dto.ts
import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';

export const MAX_QUESTION_CHARS = 4000;

export class RetrievalFiltersDto {
  @IsOptional()
  @IsString()
  @MaxLength(255)
  court?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  legalDomain?: string;

  @IsOptional()
  @IsInt()
  @Min(1800)
  yearFrom?: number;

  @IsOptional()
  @IsInt()
  @Min(1800)
  yearTo?: number;
}

export class AskQuestionDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_QUESTION_CHARS)
  question!: string;

  /** omitted to start a new session */
  @IsOptional()
  @IsString()
  @MaxLength(128)
  sessionId?: string;

  @IsOptional()
  @IsString()
  @MaxLength(128)
  userId?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => RetrievalFiltersDto)
  filters?: RetrievalFiltersDto;
}
