import { plainToInstance, Type } from 'class-transformer';
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsOptional()
  @IsString()
  OPENAI_MODEL?: string;

  @IsOptional()
  @IsString()
  OPENAI_IMAGE_MODEL?: string;

  @IsOptional()
  @IsString()
  QUESTION_PAPER_OUTPUT_DIR?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  QUESTION_TARGET_COUNT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(20)
  VALIDATION_MAX_ATTEMPTS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(1)
  DIFFICULTY_BASIC_RATIO?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(1)
  DIFFICULTY_INTERMEDIATE_RATIO?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  PORT?: number;

  @IsOptional()
  @IsString()
  FRONTEND_URLS?: string;
}

/**
 * Passed to `ConfigModule.forRoot({ validate })`. Numeric variables come
 * back as numbers, so `ConfigService.get<number>` returns what it claims.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const basic = validated.DIFFICULTY_BASIC_RATIO ?? 0.32;
  const intermediate = validated.DIFFICULTY_INTERMEDIATE_RATIO ?? 0.4;
  if (basic + intermediate > 1) {
    throw new Error(
      'Invalid environment configuration: DIFFICULTY_BASIC_RATIO and DIFFICULTY_INTERMEDIATE_RATIO must not add up to more than 1',
    );
  }

  return validated;
}
