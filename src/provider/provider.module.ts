import { Module } from '@nestjs/common';
import { TrainDataClient } from './train-data.client';

@Module({
  providers: [TrainDataClient],
  exports: [TrainDataClient],
})
export class ProviderModule {}
