#!/usr/bin/env node_modules/.bin/tsx

import yargs from 'yargs';
import { createSimulatedClock, WaveConfigError } from '@wavefront/engine';
import { createLogger, getLogLevel, type Position } from '@wavefront/shared';
import { loadEvent } from './lib/load-event';
import { runPlayback } from './lib/playback-engine';

const log = createLogger('Simulator');

function observerPosition(lat: number | undefined, lng: number | undefined): Position | null {
  if (lat === undefined && lng === undefined) return null;
  if (lat === undefined || lng === undefined) {
    throw new Error('Both --lat and --lng are required to place an observer');
  }
  return { lat, lng };
}

async function main() {
  const argv = await yargs(process.argv.slice(2))
    .scriptName('wave-simulate')
    .usage('$0 <event-file> [options]\n\nPlays back a wave event on an accelerated clock')
    .option('lat', { type: 'number', describe: 'Observer latitude' })
    .option('lng', { type: 'number', describe: 'Observer longitude' })
    .option('speed', { type: 'number', default: 60, describe: 'Simulated milliseconds per real millisecond' })
    .option('at', { type: 'string', describe: 'Simulation start (ISO 8601), defaults to the event start' })
    .option('ticks', { type: 'number', default: 10_000, describe: 'Maximum number of observations' })
    .option('log-level', {
      type: 'string',
      choices: ['debug', 'info', 'warn', 'error', 'silent'],
      describe: 'Overrides WAVE_LOG_LEVEL',
    })
    .demandCommand(1, 'An event file is required')
    .strict()
    .help()
    .parse();

  // Engine loggers read the level from the environment
  process.env.WAVE_LOG_LEVEL = getLogLevel(argv['log-level'] ?? null);

  const event = loadEvent(String(argv._[0]));
  const position = observerPosition(argv.lat, argv.lng);

  const startAt = argv.at === undefined ? event.startsAt : Date.parse(argv.at);
  if (Number.isNaN(startAt)) throw new Error(`Invalid --at date: ${argv.at}`);

  const summary = await runPlayback({
    event,
    position,
    clock: createSimulatedClock(startAt, argv.speed),
    speed: argv.speed,
    maxTicks: argv.ticks,
  });

  const { finalState } = summary;
  log.info(`Stopped after ${summary.ticks} observation(s): ${finalState.status}, ${finalState.progression.toFixed(1)}%`);
  if (summary.issues.length > 0) log.warn(`${summary.issues.length} state issue(s) reported`);
}

main().catch((error: unknown) => {
  if (error instanceof WaveConfigError) {
    log.error('Invalid event definition:');
    error.errors.forEach(message => log.error(`  ${message}`));
  } else {
    log.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
});
