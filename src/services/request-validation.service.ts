import { SENSOR_FIELDS } from '@/config/constants';
import { ChatRequest } from '@/types/chat.types';
import { SaveDataRequest } from '@/types/sensor.types';
import { ValidationResult } from '@/types/validation.types';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0;

/**
 * Checks the JSON shape of a /save_data body. Only the known sensor fields
 * are carried over; extra keys in `data` are dropped.
 */
export const validateSaveDataRequest = (body: unknown): ValidationResult<SaveDataRequest> => {
  if (!isRecord(body)) {
    return { valid: false, error: 'Request body must be a JSON object' };
  }

  const { device_id, data } = body;
  if (!isNonEmptyString(device_id)) {
    return { valid: false, error: 'device_id must be a non-empty string' };
  }

  if (!isRecord(data)) {
    return { valid: false, error: 'data must be an object of sensor readings' };
  }

  const missing = SENSOR_FIELDS.filter(field => {
    const value = data[field];
    return typeof value !== 'number' || !Number.isFinite(value);
  });
  if (missing.length > 0) {
    return { valid: false, error: `Missing or non-numeric sensor fields: ${missing.join(', ')}` };
  }

  return {
    valid: true,
    value: {
      device_id,
      data: {
        temperature: Number(data.temperature),
        humidity: Number(data.humidity),
        soil_moisture: Number(data.soil_moisture),
        gas_level: Number(data.gas_level),
        ph_value: Number(data.ph_value),
        soil_temperature: Number(data.soil_temperature),
        light_intensity: Number(data.light_intensity),
      },
    },
  };
};

export const validateChatRequest = (body: unknown): ValidationResult<ChatRequest> => {
  if (!isRecord(body)) {
    return { valid: false, error: 'Request body must be a JSON object' };
  }

  const { _id, message } = body;
  if (!isNonEmptyString(_id) || !isNonEmptyString(message)) {
    return { valid: false, error: 'Missing _id or message' };
  }

  return { valid: true, value: { _id, message } };
};
