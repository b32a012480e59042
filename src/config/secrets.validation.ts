import { plainToInstance, Transform } from 'class-transformer';
import { IsNotEmpty, IsString, validateSync } from 'class-validator';

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

export class GeminiSecrets {
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  apiKey!: string;

  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  filestoreId!: string;

  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  projectId!: string;
}

/** Dotted key as it appears in the secrets table, for error messages. */
export const SECRET_KEYS: Record<keyof GeminiSecrets, string> = {
  apiKey: 'gemini.api_key',
  filestoreId: 'gemini.filestore_id',
  projectId: 'gemini.project_id',
};

export class SecretsValidationError extends Error {
  constructor(readonly missing: string[]) {
    super(
      `Fehlende Konfiguration in secrets: ${missing.join(', ')}. ` +
        'Bitte stellen Sie sicher, dass alle erforderlichen Secrets konfiguriert sind.',
    );
    this.name = 'SecretsValidationError';
  }
}

export function validateSecrets(raw: Record<string, unknown>): GeminiSecrets {
  const secrets = plainToInstance(GeminiSecrets, raw);
  const errors = validateSync(secrets, { skipMissingProperties: false });

  if (errors.length > 0) {
    const missing = Object.entries(SECRET_KEYS)
      .filter(([property]) => errors.some((e) => e.property === property))
      .map(([, key]) => key);
    throw new SecretsValidationError(missing);
  }
  return secrets;
}
