import { ApiProperty } from '@nestjs/swagger';
import { SegmentDocument, StationStopDocument, TimetableDocument, TrainDocument } from '../interchange';

export class StationStopDto implements StationStopDocument {
  @ApiProperty({ example: 'NWK' })
  station_code!: string;
  @ApiProperty()
  station_name!: string;
  @ApiProperty({ description: 'ISO-8601 timestamp with offset' })
  scheduled!: string;
  @ApiProperty({ nullable: true, type: String, description: 'Falls back to `scheduled` when null' })
  actual!: string | null;
}

export class SegmentDto implements SegmentDocument {
  @ApiProperty({ type: StationStopDto })
  from!: StationStopDto;
  @ApiProperty({ type: StationStopDto })
  to!: StationStopDto;
}

export class TrainDto implements TrainDocument {
  @ApiProperty()
  train_id!: string;
  @ApiProperty()
  train_num!: string;
  @ApiProperty()
  route_name!: string;
  @ApiProperty({ example: 'Active' })
  status!: string;
  @ApiProperty({ type: [SegmentDto] })
  segments!: SegmentDto[];
}

export class TimetableDocumentDto implements TimetableDocument {
  @ApiProperty({ type: [String], example: ['NYP', 'NWK', 'PHL'] })
  stations!: string[];
  @ApiProperty({ type: [TrainDto] })
  trains!: TrainDto[];
}
