import { SensorRepository } from '@/database/sensor.repository';
import { FlammabilityPredictor } from '@/services/prediction.service';
import { validateSaveDataRequest } from '@/services/request-validation.service';
import { SensorRecord } from '@/types/sensor.types';
import { AppError } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface SensorServiceDependencies {
  repository: SensorRepository;
  predictor: FlammabilityPredictor;
  clock?: () => Date;
}

export interface SensorService {
  saveReading(body: unknown): Promise<SensorRecord>;
  getAllReadings(): Promise<SensorRecord[]>;
  getCurrentReading(): Promise<SensorRecord>;
}

export const createSensorService = ({
  repository,
  predictor,
  clock = () => new Date(),
}: SensorServiceDependencies): SensorService => ({
  async saveReading(body) {
    const validation = validateSaveDataRequest(body);
    if (!validation.valid) {
      throw new AppError('VALIDATION_ERROR', validation.error);
    }

    const { device_id, data } = validation.value;
    const prediction = await predictor.predict(data);

    const record = await repository.insertOne({
      device_id,
      timestamp: clock(),
      data,
      prediction,
    });

    logger.info(`Saved reading ${record._id} from ${device_id} (prediction ${prediction})`);
    return record;
  },

  async getAllReadings() {
    return repository.findAll();
  },

  async getCurrentReading() {
    const latest = await repository.findLatest();
    if (!latest) {
      throw new AppError('NOT_FOUND', 'No sensor readings stored yet');
    }
    return latest;
  },
});
