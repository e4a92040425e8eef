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

export class CreateTodoRequestDto {
  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsOptional()
  @IsString()
  description?: string;

  /** JSON text; defaults to "{}". */
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
  @IsString()
  external_url?: string;

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
