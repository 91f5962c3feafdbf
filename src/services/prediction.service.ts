import axios, { AxiosInstance } from 'axios';
import { FLAMMABILITY_CONFIG, SENSOR_FIELDS } from '@/config/constants';
import { SensorData } from '@/types/sensor.types';
import { AppError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface FlammabilityPredictor {
  predict(data: SensorData): Promise<number>;
}

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

const scaleTemperature = (celsius: number): number => {
  const { min, max } = FLAMMABILITY_CONFIG.TEMPERATURE_RANGE_C;
  return clamp01((celsius - min) / (max - min));
};

const assertFinite = (data: SensorData): void => {
  const invalid = SENSOR_FIELDS.filter(field => !Number.isFinite(data[field]));
  if (invalid.length > 0) {
    throw new AppError('PREDICTION_ERROR', `Cannot score non-finite readings: ${invalid.join(', ')}`);
  }
};

/**
 * Weighted fire-risk score in [0, 100]. Hot, dry, gassy and bright
 * conditions push the score up; pH is not a factor.
 */
export const scoreFlammability = (data: SensorData): number => {
  assertFinite(data);
  const weights = FLAMMABILITY_CONFIG.WEIGHTS;

  const factors = {
    temperature: scaleTemperature(data.temperature),
    air_dryness: clamp01(1 - data.humidity / 100),
    soil_dryness: clamp01(1 - data.soil_moisture / FLAMMABILITY_CONFIG.SOIL_MOISTURE_ADC_MAX),
    gas_level: clamp01(data.gas_level / FLAMMABILITY_CONFIG.GAS_LEVEL_MAX),
    soil_temperature: scaleTemperature(data.soil_temperature),
    light_intensity: clamp01(data.light_intensity / FLAMMABILITY_CONFIG.LIGHT_INTENSITY_MAX),
  };

  const score =
    factors.temperature * weights.temperature +
    factors.air_dryness * weights.air_dryness +
    factors.soil_dryness * weights.soil_dryness +
    factors.gas_level * weights.gas_level +
    factors.soil_temperature * weights.soil_temperature +
    factors.light_intensity * weights.light_intensity;

  return Math.round(score * 100);
};

export const heuristicPredictor: FlammabilityPredictor = {
  async predict(data) {
    return scoreFlammability(data);
  },
};

export type PredictorHttpClient = Pick<AxiosInstance, 'post'>;

interface RemotePredictionResponse {
  prediction?: unknown;
}

/**
 * Delegates scoring to an out-of-process model that accepts the readings as
 * JSON and answers `{ "prediction": number }`.
 */
export const createRemotePredictor = (
  url: string,
  http: PredictorHttpClient = axios,
  timeoutMs: number = FLAMMABILITY_CONFIG.REMOTE_TIMEOUT_MS,
): FlammabilityPredictor => ({
  async predict(data) {
    assertFinite(data);
    try {
      const response = await http.post<RemotePredictionResponse>(url, data, { timeout: timeoutMs });
      const prediction = response.data.prediction;
      if (typeof prediction !== 'number' || !Number.isFinite(prediction)) {
        throw new AppError('PREDICTION_ERROR', 'Remote predictor returned a non-numeric prediction');
      }
      return prediction;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      logger.warn('Remote flammability prediction failed', { url, message: error instanceof Error ? error.message : String(error) });
      throw new AppError('PREDICTION_ERROR', 'Remote flammability prediction failed', { cause: error });
    }
  },
});
