import { IsEmail, IsNotEmpty, IsString } from 'class-validator';

/**
 * DTO for user login.
 *
 * Only presence is checked here; credential verification happens in
 * AuthService so every failure produces the same message.
 */
export class LoginDto {
  @IsEmail({}, { message: 'Please provide a valid email address' })
  @IsNotEmpty({ message: 'Email is required' })
  email!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;
}
