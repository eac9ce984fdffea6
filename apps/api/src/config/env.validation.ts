import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

const ROUTE_PATTERN = /^\/[^\s?#]*$/;

/**
 * Parses "true"/"false" env strings; leaves anything else for the validator
 * to reject. Reads the raw source value: implicit conversion has already
 * run `Boolean("false")` by the time `value` arrives.
 */
const toBoolean = ({
  obj,
  key,
}: {
  obj: Record<string, unknown>;
  key: string;
}): unknown => {
  const raw = obj[key];
  if (raw === true || raw === 'true') return true;
  if (raw === false || raw === 'false') return false;
  return raw;
};

/**
 * Environment variables read by the API, validated once at start-up.
 *
 * Numeric values arrive as strings and are converted by
 * `enableImplicitConversion`, which reads the declared property types, so
 * every property carries an explicit annotation. Booleans go through
 * `toBoolean` because implicit conversion would turn "false" into `true`.
 */
export class EnvironmentVariables {
  // ── Tokens ────────────────────────────────────────────────
  @IsString()
  @IsNotEmpty({ message: 'JWT_SECRET is not defined. Check your .env file.' })
  JWT_SECRET!: string;

  @IsIn(JWT_ALGORITHMS)
  JWT_ALGORITHM: JwtAlgorithm = 'HS256';

  @IsInt()
  @Min(1)
  ACCESS_TOKEN_EXPIRE_MINUTES: number = 15;

  @IsInt()
  @Min(1)
  REFRESH_TOKEN_EXPIRE_MINUTES: number = 60 * 24 * 7;

  @IsInt()
  @Min(4)
  @Max(15)
  BCRYPT_SALT_ROUNDS: number = 12;

  // ── Routes ────────────────────────────────────────────────
  @Matches(ROUTE_PATTERN)
  LOGIN_ROUTE: string = '/login';

  @Matches(ROUTE_PATTERN)
  REFRESH_ROUTE: string = '/auth/refresh';

  @Matches(ROUTE_PATTERN)
  HOME_ROUTE: string = '/';

  @Matches(ROUTE_PATTERN)
  ADMIN_ROUTE_PREFIX: string = '/admin';

  // ── Cookies ───────────────────────────────────────────────
  @Transform(toBoolean)
  @IsBoolean()
  COOKIE_SECURE: boolean = true;

  // ── PostgreSQL ────────────────────────────────────────────
  @IsString()
  POSTGRES_HOST: string = 'localhost';

  @IsInt()
  POSTGRES_PORT: number = 5432;

  @IsString()
  POSTGRES_USER: string = 'sessiongate';

  @IsString()
  POSTGRES_PASSWORD: string = 'sessiongate_secret';

  @IsString()
  POSTGRES_DB: string = 'sessiongate';

  @Transform(toBoolean)
  @IsBoolean()
  DB_MIGRATIONS_RUN: boolean = false;

  // ── Redis ─────────────────────────────────────────────────
  @IsString()
  REDIS_HOST: string = 'localhost';

  @IsInt()
  REDIS_PORT: number = 6379;

  @IsOptional()
  @IsString()
  REDIS_PASSWORD?: string;

  @IsInt()
  @Min(0)
  REDIS_DB: number = 0;

  // ── HTTP ──────────────────────────────────────────────────
  @IsInt()
  API_PORT: number = 4000;

  @IsString()
  API_CORS_ORIGIN: string = 'http://localhost:3000';

  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;
}

/**
 * `validate` hook for ConfigModule.forRoot().
 *
 * @throws Error listing every invalid variable
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
