import { Types } from 'mongoose';
import SensorRecordModel from '@/models/SensorRecord';
import { NewSensorRecord, SensorData, SensorRecord } from '@/types/sensor.types';
import { logger } from '@/utils/logger';

export interface SensorRepository {
  insertOne(record: NewSensorRecord): Promise<SensorRecord>;
  /** Every record, newest first. */
  findAll(): Promise<SensorRecord[]>;
  findLatest(): Promise<SensorRecord | null>;
}

// Shape read back from the collection; nothing beyond _id is trusted
export interface LeanSensorDocument {
  _id: Types.ObjectId;
  [field: string]: unknown;
}

const NEWEST_FIRST = { timestamp: -1, _id: -1 } as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

const toIsoTimestamp = (value: unknown): string | null => {
  const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null;
  return date && !Number.isNaN(date.getTime()) ? date.toISOString() : null;
};

const readSensorData = (source: Record<string, unknown>): SensorData | null => {
  const { temperature, humidity, soil_moisture, gas_level, ph_value, soil_temperature, light_intensity } = source;
  if (
    isFiniteNumber(temperature) &&
    isFiniteNumber(humidity) &&
    isFiniteNumber(soil_moisture) &&
    isFiniteNumber(gas_level) &&
    isFiniteNumber(ph_value) &&
    isFiniteNumber(soil_temperature) &&
    isFiniteNumber(light_intensity)
  ) {
    return { temperature, humidity, soil_moisture, gas_level, ph_value, soil_temperature, light_intensity };
  }
  return null;
};

/**
 * Maps a stored document to the API shape. Readings kept at the top level
 * and string timestamps are normalised; anything else incomplete yields null.
 */
export const toSensorRecord = (doc: LeanSensorDocument): SensorRecord | null => {
  const timestamp = toIsoTimestamp(doc.timestamp);
  const { device_id, prediction, data: nested } = doc;
  const data = readSensorData(isRecord(nested) ? nested : doc);

  if (!timestamp || !data || typeof device_id !== 'string' || !isFiniteNumber(prediction)) {
    return null;
  }

  return { _id: doc._id.toString(), device_id, timestamp, data, prediction };
};

const mapOrSkip = (doc: LeanSensorDocument): SensorRecord[] => {
  const record = toSensorRecord(doc);
  if (!record) {
    logger.warn(`Skipping malformed sensor document ${doc._id.toString()}`);
    return [];
  }
  return [record];
};

export const mongoSensorRepository: SensorRepository = {
  async insertOne(record) {
    const doc = await SensorRecordModel.create(record);
    return {
      _id: doc._id.toString(),
      device_id: record.device_id,
      timestamp: record.timestamp.toISOString(),
      data: { ...record.data },
      prediction: record.prediction,
    };
  },

  async findAll() {
    const docs = await SensorRecordModel.find({}).sort(NEWEST_FIRST).lean<LeanSensorDocument[]>();
    return docs.flatMap(mapOrSkip);
  },

  async findLatest() {
    const doc = await SensorRecordModel.findOne({}).sort(NEWEST_FIRST).lean<LeanSensorDocument>();
    if (!doc) {
      return null;
    }
    return mapOrSkip(doc)[0] ?? null;
  },
};
