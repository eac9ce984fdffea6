import { IsNotEmpty, IsString } from 'class-validator';

/**
 * DTO for login.
 *
 * Only presence is checked; anything else would tell a caller which
 * usernames exist.
 */
export class LoginDto {
  @IsString()
  @IsNotEmpty({ message: 'Username is required' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;
}
