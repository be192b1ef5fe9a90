import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  // Optional at boot: a missing key is reported per request instead.
  @IsOptional()
  @IsString()
  ULTRALYTICS_API_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  ULTRALYTICS_API_URL?: string;

  @IsOptional()
  @IsString()
  ULTRALYTICS_MODEL_URL?: string;

  @IsOptional()
  @IsInt()
  @Min(1000)
  ULTRALYTICS_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT?: number;
}

/**
 * Validate process environment for ConfigModule.forRoot.
 * Throws on the first malformed variable so the app refuses to boot.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validatedConfig;
}
