import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { TrainsModule } from './trains/trains.module';

@Module({
  imports: [ConfigModule, TrainsModule],
})
export class AppModule {}
