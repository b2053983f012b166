import { IsOptional, IsUUID } from 'class-validator';

export class ReviewQueryDto {
  @IsUUID()
  @IsOptional()
  classroom_id?: string;
}
