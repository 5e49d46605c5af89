import { Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { BitmapFont } from './bitmap-font';
import { loadFont } from './font-loader';
import { TimelineRenderer } from './timeline-renderer';

export const BITMAP_FONT = Symbol('BITMAP_FONT');

@Module({
  providers: [
    {
      provide: BITMAP_FONT,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): BitmapFont => loadFont(config.fontPath),
    },
    {
      provide: TimelineRenderer,
      inject: [BITMAP_FONT, APP_CONFIG],
      useFactory: (font: BitmapFont, config: AppConfig): TimelineRenderer =>
        new TimelineRenderer(font, { timeZone: config.timeZone }),
    },
  ],
  exports: [TimelineRenderer],
})
export class RenderModule {}
