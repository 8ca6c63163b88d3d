import {
  BadRequestException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, Like, FindOptionsWhere } from 'typeorm';
import { Event } from './entities/event.entity';
import { CreateEventDto } from './dto/create-event.dto';
import { ListEventsDto } from './dto/list-events.dto';

export interface PaginatedResult<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

@Injectable()
export class EventsService {
  constructor(
    @InjectRepository(Event)
    private readonly eventRepository: Repository<Event>,
  ) {}

  async createEvent(dto: CreateEventDto, organizerId: string): Promise<Event> {
    const startDate = new Date(dto.startDate);
    const endDate = new Date(dto.endDate);

    if (endDate.getTime() <= startDate.getTime()) {
      throw new BadRequestException(
        'Event end date must be after its start date',
      );
    }

    const event = this.eventRepository.create({
      title: dto.title,
      description: dto.description ?? null,
      location: dto.location ?? null,
      maxAttendees: dto.maxAttendees ?? null,
      startDate,
      endDate,
      organizerId,
    });
    return this.eventRepository.save(event);
  }

  async getEventById(id: string): Promise<Event> {
    const event = await this.findEventById(id);
    if (!event) {
      throw new NotFoundException(`Event with id "${id}" not found`);
    }
    return event;
  }

  findEventById(id: string): Promise<Event | null> {
    return this.eventRepository.findOne({ where: { id } });
  }

  async listEvents(filterDto: ListEventsDto): Promise<PaginatedResult<Event>> {
    const { organizerId, search, page = 1, limit = 10 } = filterDto;

    const where: FindOptionsWhere<Event> = {
      ...(organizerId ? { organizerId } : {}),
      ...(search ? { title: Like(`%${search}%`) } : {}),
    };

    const [data, total] = await this.eventRepository.findAndCount({
      where,
      order: { startDate: 'ASC' },
      skip: (page - 1) * limit,
      take: limit,
    });

    return {
      data,
      total,
      page,
      limit,
      totalPages: Math.ceil(total / limit),
    };
  }
}
