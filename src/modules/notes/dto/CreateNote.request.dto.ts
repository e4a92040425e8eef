import { IsArray, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class CreateNoteRequestDto {
  @IsString()
  @IsNotEmpty()
  key!: string;

  @IsString()
  @IsNotEmpty()
  data!: string;

  @IsOptional()
  @IsString()
  user_uid?: string;

  @IsOptional()
  @IsString()
  household_uid?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];
}
