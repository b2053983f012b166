import { Controller, Get, Param, ParseUUIDPipe, Query } from '@nestjs/common';
import { ClassroomService } from './services/classroom.service';
import { ClassroomDayQueryDto, ListClassroomsQueryDto } from './dto/classroom-query.dto';

@Controller('classrooms')
export class ClassroomController {
  constructor(private readonly classroomService: ClassroomService) {}

  @Get()
  listClassrooms(@Query() query: ListClassroomsQueryDto) {
    return this.classroomService.listClassrooms(query.offset, query.limit);
  }

  @Get(':id')
  getClassroom(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: ClassroomDayQueryDto,
  ) {
    return this.classroomService.getClassroom(id, query.date);
  }
}
