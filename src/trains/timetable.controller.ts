import { Controller, Get, Query } from '@nestjs/common';
import { ApiOkResponse, ApiQuery, ApiTags } from '@nestjs/swagger';
import { toTimetableDocument } from '../timetable/interchange';
import { TimetableDocumentDto } from '../timetable/dto/timetable.dto';
import { parseStationList } from './station-list';
import { TrainsService } from './trains.service';

@ApiTags('trains')
@Controller('timetable')
export class TimetableController {
  constructor(private readonly trains: TrainsService) {}

  @Get()
  @ApiQuery({ name: 'stations', example: 'NYP,NWK,PHL' })
  @ApiOkResponse({ type: TimetableDocumentDto })
  async getTimetable(@Query('stations') stations: string | undefined): Promise<TimetableDocumentDto> {
    const timetable = await this.trains.timetable(parseStationList(stations, ','));
    return toTimetableDocument(timetable);
  }
}
