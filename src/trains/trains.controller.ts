import { Controller, DefaultValuePipe, Get, Header, Param, ParseIntPipe, Query, StreamableFile } from '@nestjs/common';
import { ApiProduces, ApiQuery, ApiTags } from '@nestjs/swagger';
import { assertBufferMinutes, parseStationList } from './station-list';
import { TrainsService } from './trains.service';

@ApiTags('trains')
@Controller('trains')
export class TrainsController {
  constructor(private readonly trains: TrainsService) {}

  @Get()
  @Header('Content-Type', 'image/png')
  @Header('Cache-Control', 'no-cache')
  @ApiProduces('image/png')
  @ApiQuery({ name: 'stations', example: 'NYP,NWK,PHL' })
  @ApiQuery({ name: 'buffer_before', required: false, type: Number })
  @ApiQuery({ name: 'buffer_after', required: false, type: Number })
  async timelineByQuery(
    @Query('stations') stations: string | undefined,
    @Query('buffer_before', new DefaultValuePipe(0), ParseIntPipe) bufferBefore: number,
    @Query('buffer_after', new DefaultValuePipe(0), ParseIntPipe) bufferAfter: number,
  ): Promise<StreamableFile> {
    return this.timeline(parseStationList(stations, ','), bufferBefore, bufferAfter);
  }

  @Get('*')
  @Header('Content-Type', 'image/png')
  @Header('Cache-Control', 'no-cache')
  @ApiProduces('image/png')
  async timelineByPath(
    @Param('0') path: string,
    @Query('buffer_before', new DefaultValuePipe(0), ParseIntPipe) bufferBefore: number,
    @Query('buffer_after', new DefaultValuePipe(0), ParseIntPipe) bufferAfter: number,
  ): Promise<StreamableFile> {
    return this.timeline(parseStationList(path, '/'), bufferBefore, bufferAfter);
  }

  private async timeline(stations: string[], bufferBefore: number, bufferAfter: number): Promise<StreamableFile> {
    const png = await this.trains.timelinePng(stations, {
      bufferBeforeMinutes: assertBufferMinutes(bufferBefore, 'buffer_before'),
      bufferAfterMinutes: assertBufferMinutes(bufferAfter, 'buffer_after'),
    });
    return new StreamableFile(png);
  }
}
