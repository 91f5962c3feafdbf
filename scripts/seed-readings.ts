#!/usr/bin/env ts-node
/**
 * CLI script to insert synthetic sensor readings for local development
 *
 * Usage:
 *   npm run seed -- --device station-01 --count 24
 *   npm run seed -- --device station-01 --count 5 --dry-run
 */

import mongoose from 'mongoose';
import { connectDB } from '@/database/connection';
import { mongoSensorRepository } from '@/database/sensor.repository';
import { heuristicPredictor } from '@/services/prediction.service';
import { createSensorService } from '@/services/sensor.service';
import { SaveDataRequest } from '@/types/sensor.types';
import { logger } from '@/utils/logger';

interface CLIArgs {
  device: string;
  count: number;
  dryRun: boolean;
}

function parseArgs(): CLIArgs {
  const args = process.argv.slice(2);
  const parsed: CLIArgs = {
    device: 'station-01',
    count: 10,
    dryRun: false
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--device':
        parsed.device = args[++i] ?? parsed.device;
        break;
      case '--count':
        parsed.count = Number.parseInt(args[++i] ?? '', 10);
        break;
      case '--dry-run':
        parsed.dryRun = true;
        break;
    }
  }

  return parsed;
}

const round = (value: number, digits: number = 1): number => Number(value.toFixed(digits));

// Readings drift around a mild Terai afternoon
function syntheticReading(device_id: string): SaveDataRequest {
  return {
    device_id,
    data: {
      temperature: round(22 + Math.random() * 12),
      humidity: round(40 + Math.random() * 40),
      soil_moisture: Math.round(300 + Math.random() * 500),
      gas_level: Math.round(150 + Math.random() * 250),
      ph_value: round(5.8 + Math.random() * 1.6),
      soil_temperature: round(18 + Math.random() * 10),
      light_intensity: Math.round(100 + Math.random() * 800)
    }
  };
}

async function main() {
  const args = parseArgs();
  if (!Number.isInteger(args.count) || args.count < 1) {
    console.log('--count must be a positive integer');
    process.exit(1);
  }

  const readings = Array.from({ length: args.count }, () => syntheticReading(args.device));

  if (args.dryRun) {
    for (const reading of readings) {
      console.log(JSON.stringify({ ...reading, prediction: await heuristicPredictor.predict(reading.data) }));
    }
    return;
  }

  await connectDB();
  const sensorService = createSensorService({ repository: mongoSensorRepository, predictor: heuristicPredictor });

  try {
    for (const reading of readings) {
      await sensorService.saveReading(reading);
    }
    logger.info(`Seeded ${readings.length} readings for ${args.device}`);
  } finally {
    await mongoose.disconnect();
  }
}

main().catch((error: unknown) => {
  logger.error('Seeding failed:', error);
  process.exit(1);
});
