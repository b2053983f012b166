import { IsInt, IsNotEmpty, IsString, IsUUID, Max, MaxLength, Min } from 'class-validator';

export class CreateReviewDto {
  @IsUUID()
  classroom_id!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  author!: string;

  @IsInt()
  @Min(1)
  @Max(10)
  rating!: number;

  @IsString()
  @IsNotEmpty()
  comment!: string;
}
