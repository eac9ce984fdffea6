import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

/** Body of POST /auth/refresh; the token may also come from the cookie */
export class RefreshTokenDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  refreshToken?: string;
}
