import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsEnum,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

enum NodeEnv {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

class EnvironmentVariables {
  @IsEnum(NodeEnv)
  @IsOptional()
  NODE_ENV: NodeEnv = NodeEnv.Development;

  @IsInt()
  @IsOptional()
  PORT: number = 3000;

  @IsString()
  @IsOptional()
  CORS_ORIGINS?: string;

  @IsString()
  @IsOptional()
  DB_HOST?: string;

  @IsInt()
  @IsOptional()
  DB_PORT?: number;

  @IsString()
  @IsOptional()
  DB_USERNAME?: string;

  @IsString()
  @IsOptional()
  DB_PASSWORD?: string;

  @IsString()
  @IsOptional()
  DB_DATABASE?: string;

  @IsBooleanString()
  @IsOptional()
  DB_SYNCHRONIZE?: string;

  @IsBooleanString()
  @IsOptional()
  DB_LOGGING?: string;

  @IsInt()
  @Min(0)
  @Max(23)
  @IsOptional()
  BOOKING_OPEN_HOUR: number = 7;

  @IsInt()
  @Min(1)
  @Max(23)
  @IsOptional()
  BOOKING_CLOSE_HOUR: number = 18;

  @IsInt()
  @Min(1)
  @Max(1440)
  @IsOptional()
  BOOKING_GRANULARITY_MINUTES: number = 60;

  @IsIn(['single', 'per-unit'])
  @IsOptional()
  BOOKING_STORAGE_MODE: 'single' | 'per-unit' = 'single';

  @IsBooleanString()
  @IsOptional()
  SEED_DATABASE?: string;
}

/**
 * Granularity must tile an hour, or tile a day in whole hours, so that every
 * aligned boundary falls at the same minutes past the hour.
 */
function tilesTheDay(granularityMinutes: number): boolean {
  if (granularityMinutes <= 60) {
    return 60 % granularityMinutes === 0;
  }
  return granularityMinutes % 60 === 0 && 1440 % granularityMinutes === 0;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, { skipMissingProperties: false });
  if (errors.length > 0) {
    throw new Error(errors.toString());
  }

  if (validatedConfig.BOOKING_OPEN_HOUR >= validatedConfig.BOOKING_CLOSE_HOUR) {
    throw new Error('BOOKING_OPEN_HOUR must be earlier than BOOKING_CLOSE_HOUR');
  }

  if (!tilesTheDay(validatedConfig.BOOKING_GRANULARITY_MINUTES)) {
    throw new Error(
      'BOOKING_GRANULARITY_MINUTES must divide 60, or be a whole number of hours dividing a day',
    );
  }

  const openMinutes = validatedConfig.BOOKING_OPEN_HOUR * 60;
  const spanMinutes =
    (validatedConfig.BOOKING_CLOSE_HOUR - validatedConfig.BOOKING_OPEN_HOUR) * 60;
  if (
    openMinutes % validatedConfig.BOOKING_GRANULARITY_MINUTES !== 0 ||
    spanMinutes % validatedConfig.BOOKING_GRANULARITY_MINUTES !== 0
  ) {
    throw new Error(
      'Opening hours must start on and span a whole number of BOOKING_GRANULARITY_MINUTES units',
    );
  }

  return validatedConfig;
}
