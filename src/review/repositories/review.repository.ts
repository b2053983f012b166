import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Review } from '../entities/review.entity';
import { CreateReviewDto } from '../dto/create-review.dto';

@Injectable()
export class ReviewRepository {
  constructor(
    @InjectRepository(Review)
    private readonly reviewRepository: Repository<Review>,
  ) {}

  async create(dto: CreateReviewDto): Promise<Review> {
    const review = this.reviewRepository.create({
      classroom_id: dto.classroom_id,
      author: dto.author,
      rating: dto.rating,
      comment: dto.comment,
    });
    return await this.reviewRepository.save(review);
  }

  async findAll(classroomId?: string): Promise<Review[]> {
    return await this.reviewRepository.find({
      where: classroomId ? { classroom_id: classroomId } : {},
      order: { created_at: 'DESC' },
    });
  }
}
