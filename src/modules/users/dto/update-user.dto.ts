import { IsEmail, IsNotEmpty, IsOptional, IsString, Matches, MaxLength, MinLength } from 'class-validator';

/** PUT /users/:id. Omitted fields keep their stored values; the password changes only when given. */
export class UpdateUserDto {
  @IsOptional()
  @IsEmail({}, { message: 'Please provide a valid email address' })
  email?: string;

  @IsOptional()
  @IsString()
  @Matches(/^[A-Za-z0-9_.-]{3,50}$/, {
    message: 'Username must be 3-50 characters of letters, digits, dots, dashes or underscores',
  })
  username?: string;

  @IsOptional()
  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters long' })
  @MaxLength(72)
  password?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'First name is required' })
  @MaxLength(100)
  firstName?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'Last name is required' })
  @MaxLength(100)
  lastName?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  nativeLanguageId?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  currentLanguageId?: string;
}
