import { Schema, model } from 'mongoose';
import { COLLECTIONS } from '@/config/constants';
import { NewSensorRecord, SensorData } from '@/types/sensor.types';

const sensorDataSchema = new Schema<SensorData>({
  temperature: { type: Number, required: true },
  humidity: { type: Number, required: true },
  soil_moisture: { type: Number, required: true },
  gas_level: { type: Number, required: true },
  ph_value: { type: Number, required: true },
  soil_temperature: { type: Number, required: true },
  light_intensity: { type: Number, required: true }
}, { _id: false });

const sensorRecordSchema = new Schema<NewSensorRecord>({
  device_id: {
    type: String,
    required: true,
    index: true
  },
  timestamp: {
    type: Date,
    required: true,
    immutable: true
  },
  data: {
    type: sensorDataSchema,
    required: true
  },
  prediction: {
    type: Number,
    required: true
  }
}, {
  collection: COLLECTIONS.SENSOR_DATA,
  versionKey: false
});

// Newest-first reads
sensorRecordSchema.index({ timestamp: -1, _id: -1 });

const SensorRecordModel = model<NewSensorRecord>('SensorRecord', sensorRecordSchema);

export default SensorRecordModel;
