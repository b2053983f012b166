import { TimeSlotView } from '../../booking/dto/booking-response.dto';

export interface ClassroomView {
  id: string;
  name: string;
  type: string;
  level: number;
  size: number;
  image_url: string | null;
}

export interface ClassroomDetailView extends ClassroomView {
  date: string;
  timeslots: TimeSlotView[];
}
