import { Type } from 'class-transformer';
import { IsDateString, IsInt, IsOptional, Max, Min, Matches } from 'class-validator';

export class ListClassroomsQueryDto {
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @IsOptional()
  offset?: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  @IsOptional()
  limit?: number;
}

export class ClassroomDayQueryDto {
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'date must be formatted as YYYY-MM-DD' })
  @IsDateString({ strict: true })
  @IsOptional()
  date?: string;
}
