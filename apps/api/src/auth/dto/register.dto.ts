import {
  IsEmail,
  IsNotEmpty,
  IsString,
  Matches,
  MaxLength,
  MinLength,
} from 'class-validator';

/**
 * DTO for account registration.
 *
 * Validated by the global ValidationPipe (whitelist + forbidNonWhitelisted).
 * Username length mirrors the `users.username` column.
 */
export class RegisterDto {
  @IsString()
  @MinLength(1, { message: 'Username is required' })
  @MaxLength(20, { message: 'Username must be at most 20 characters long' })
  @Matches(/^[A-Za-z0-9_.-]+$/, {
    message: 'Username may only contain letters, digits, "_", "." and "-"',
  })
  username!: string;

  @IsEmail({}, { message: 'Please provide a valid email address' })
  @IsNotEmpty({ message: 'Email is required' })
  email!: string;

  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters long' })
  @MaxLength(128, { message: 'Password must be at most 128 characters long' })
  password!: string;
}
