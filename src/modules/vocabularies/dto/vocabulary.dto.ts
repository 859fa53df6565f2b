import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CreateVocabularyDto {
  @IsString()
  @IsNotEmpty()
  languageId!: string;

  @IsString()
  @IsNotEmpty({ message: 'Vocabulary name is required' })
  @MaxLength(100)
  name!: string;
}

/** A vocabulary's user and language are fixed; only the name changes. */
export class UpdateVocabularyDto {
  @IsString()
  @IsNotEmpty({ message: 'Vocabulary name is required' })
  @MaxLength(100)
  name!: string;
}
