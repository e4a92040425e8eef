import {
  IsArray,
  IsJSON,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class CreatePreferenceRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  key!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  specifier!: string;

  /** JSON text. */
  @IsJSON()
  data!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];
}
