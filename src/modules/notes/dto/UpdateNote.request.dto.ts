import { IsArray, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class UpdateNoteRequestDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  key?: string;

  @IsOptional()
  @IsString()
  data?: string;

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
