import { Module } from '@nestjs/common';
import { ProviderModule } from '../provider/provider.module';
import { TrainFinderService } from './train-finder.service';

@Module({
  imports: [ProviderModule],
  providers: [TrainFinderService],
  exports: [TrainFinderService],
})
export class TimetableModule {}
