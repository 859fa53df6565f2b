import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class TagDto {
  @IsString()
  @IsNotEmpty({ message: 'Tag name is required' })
  @MaxLength(50)
  name!: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  description?: string;
}
