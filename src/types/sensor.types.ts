import { SENSOR_FIELDS } from '@/config/constants';

export type SensorField = (typeof SENSOR_FIELDS)[number];

export type SensorData = Record<SensorField, number>;

// Body of POST /save_data
export interface SaveDataRequest {
  device_id: string;
  data: SensorData;
}

export interface NewSensorRecord {
  device_id: string;
  timestamp: Date;
  data: SensorData;
  prediction: number;
}

// Shape returned by the read endpoints
export interface SensorRecord {
  _id: string;
  device_id: string;
  timestamp: string;        // ISO-8601, server-assigned
  data: SensorData;
  prediction: number;
}

export interface SaveDataResponse {
  status: 'success';
}
