import {
  IsArray,
  IsInt,
  IsJSON,
  IsNotEmpty,
  IsOptional,
  IsRFC3339,
  IsString,
  Max,
  Min,
} from 'class-validator';

// Every field is optional; only the ones present are written.
export class UpdateTodoRequestDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  title?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsJSON()
  data?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(5)
  priority?: number;

  @IsOptional()
  @IsRFC3339()
  due_date?: string;

  @IsOptional()
  @IsString()
  recurs_on?: string;

  @IsOptional()
  @IsRFC3339()
  marked_complete?: string;

  @IsOptional()
  @IsString()
  external_url?: string;

  @IsOptional()
  @IsString()
  completed_by?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];
}
