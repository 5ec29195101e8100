export const LEGAL_DISCLAIMER =
  'Please note: this is legal information, not legal advice. Consult a qualified legal professional about your specific situation.';
