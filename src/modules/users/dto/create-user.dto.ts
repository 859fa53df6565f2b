import { IsEmail, IsNotEmpty, IsString, Matches, MaxLength, MinLength } from 'class-validator';

export class CreateUserDto {
  @IsEmail({}, { message: 'Please provide a valid email address' })
  email!: string;

  @IsString()
  @Matches(/^[A-Za-z0-9_.-]{3,50}$/, {
    message: 'Username must be 3-50 characters of letters, digits, dots, dashes or underscores',
  })
  username!: string;

  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters long' })
  @MaxLength(72)
  password!: string;

  @IsString()
  @IsNotEmpty({ message: 'First name is required' })
  @MaxLength(100)
  firstName!: string;

  @IsString()
  @IsNotEmpty({ message: 'Last name is required' })
  @MaxLength(100)
  lastName!: string;

  @IsString()
  @IsNotEmpty()
  nativeLanguageId!: string;

  @IsString()
  @IsNotEmpty()
  currentLanguageId!: string;
}
