import { Module } from '@nestjs/common';
import { RenderModule } from '../render/render.module';
import { TimetableModule } from '../timetable/timetable.module';
import { RouteCacheService } from './route-cache.service';
import { TimetableController } from './timetable.controller';
import { TrainsController } from './trains.controller';
import { TrainsService } from './trains.service';

@Module({
  imports: [TimetableModule, RenderModule],
  controllers: [TimetableController, TrainsController],
  providers: [RouteCacheService, TrainsService],
})
export class TrainsModule {}
