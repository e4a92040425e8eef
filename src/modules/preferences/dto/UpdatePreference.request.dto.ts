import { IsArray, IsJSON, IsOptional, IsString } from 'class-validator';

export class UpdatePreferenceRequestDto {
  @IsOptional()
  @IsJSON()
  data?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];
}
