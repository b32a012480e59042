export const GENAI_CLIENT = Symbol('GENAI_CLIENT');
