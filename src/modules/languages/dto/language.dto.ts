import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';

const LANGUAGE_CODE = /^[a-z]{2,3}(-[A-Za-z0-9]{2,8})*$/;
const LANGUAGE_CODE_MESSAGE = 'Code must be an ISO language code such as "es" or "pt-BR"';

/** Body of POST /languages. */
export class LanguageDto {
  @IsString()
  @IsNotEmpty({ message: 'Name is required' })
  @MaxLength(100)
  name!: string;

  @IsString()
  @Matches(LANGUAGE_CODE, { message: LANGUAGE_CODE_MESSAGE })
  code!: string;

  @IsString()
  @IsNotEmpty({ message: 'Native name is required' })
  @MaxLength(100)
  nativeName!: string;
}

/** Body of PUT /languages/:id. Omitted fields keep their stored values. */
export class UpdateLanguageDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'Name is required' })
  @MaxLength(100)
  name?: string;

  @IsOptional()
  @IsString()
  @Matches(LANGUAGE_CODE, { message: LANGUAGE_CODE_MESSAGE })
  code?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'Native name is required' })
  @MaxLength(100)
  nativeName?: string;
}
