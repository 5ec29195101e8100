import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class StartSessionDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  userId!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string;
}
