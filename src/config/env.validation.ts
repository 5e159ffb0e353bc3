import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  // Empty or missing disables the AI narrative
  @IsOptional()
  @IsString()
  HF_TOKEN?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  LLM_MODEL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  NARRATIVE_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  NARRATIVE_MAX_TOKENS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MAX_UPLOAD_BYTES?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  MIN_CHARS_PER_PAGE?: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  SCORING_CONFIG_DIR?: string;
}

/**
 * Validate process environment at startup (ConfigModule `validate` hook)
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const problems = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}).map((message) => `${error.property}: ${message}`),
    );
    throw new Error(`Invalid environment configuration:\n - ${problems.join('\n - ')}`);
  }
  return validated;
}
