#!/usr/bin/env node
import 'reflect-metadata';
import { readFile, writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { INestApplicationContext, Logger, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { APP_CONFIG, AppConfig } from './config/app.config';
import { ConfigModule } from './config/config.module';
import { encodePng } from './render/png';
import { RenderModule } from './render/render.module';
import { TimelineRenderer } from './render/timeline-renderer';
import { parseTimetable, serializeTimetable } from './timetable/interchange';
import { formatTimetableSummary } from './timetable/summary';
import { TimetableModule } from './timetable/timetable.module';
import { TrainFinderService } from './timetable/train-finder.service';
import { normalizeStationCode } from './timetable/timetable.model';

@Module({
  imports: [ConfigModule, TimetableModule, RenderModule],
})
class CliModule {}

const USAGE = [
  'Usage:',
  '  rail-ribbon find <station1> <station2> [station3] ...',
  '  rail-ribbon render <trains.json> [output.png] [--buffer-before N] [--buffer-after N]',
  '',
  'Example: rail-ribbon find NYP NWK PHL',
].join('\n');

function minutesOption(value: string | undefined, name: string): number {
  if (value === undefined) {
    return 0;
  }
  if (!/^\d+$/.test(value)) {
    throw new Error(`--${name} must be a non-negative integer`);
  }
  return Number.parseInt(value, 10);
}

async function findCommand(app: INestApplicationContext, args: string[]): Promise<void> {
  const stations = args.map(normalizeStationCode);
  if (stations.length < 2) {
    throw new Error(USAGE);
  }
  const config = app.get<AppConfig>(APP_CONFIG);
  process.stdout.write(`Searching for trains: ${stations.join(' -> ')}...\n`);
  const timetable = await app.get(TrainFinderService).buildTimetable(stations);
  process.stdout.write(formatTimetableSummary(timetable, config.timeZone));

  const filename = `trains_${stations.join('_')}.json`;
  await writeFile(filename, `${serializeTimetable(timetable)}\n`, 'utf8');
  process.stdout.write(`Saved results to ${filename}\n`);
}

async function renderCommand(
  app: INestApplicationContext,
  args: string[],
  options: { bufferBefore: number; bufferAfter: number },
): Promise<void> {
  const [input, explicitOutput] = args;
  if (!input) {
    throw new Error(USAGE);
  }
  const output = explicitOutput ?? `${input.replace(/\.json$/i, '')}.png`;
  const timetable = parseTimetable(await readFile(input, 'utf8'));
  const bitmap = app.get(TimelineRenderer).render({
    trains: timetable.trains,
    stations: timetable.stations,
    now: new Date(),
    bufferBeforeMinutes: options.bufferBefore,
    bufferAfterMinutes: options.bufferAfter,
  });
  await writeFile(output, encodePng(bitmap));
  process.stdout.write(`Generated ${output}\n`);
}

async function main(argv: string[]): Promise<void> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'buffer-before': { type: 'string' },
      'buffer-after': { type: 'string' },
    },
  });
  const [command, ...rest] = positionals;
  if (command !== 'find' && command !== 'render') {
    throw new Error(USAGE);
  }

  const app = await NestFactory.createApplicationContext(CliModule, { logger: ['error', 'warn'] });
  try {
    if (command === 'find') {
      await findCommand(app, rest);
    } else {
      await renderCommand(app, rest, {
        bufferBefore: minutesOption(values['buffer-before'], 'buffer-before'),
        bufferAfter: minutesOption(values['buffer-after'], 'buffer-after'),
      });
    }
  } finally {
    await app.close();
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.message : String(err), undefined, 'CLI');
  process.exit(1);
});
