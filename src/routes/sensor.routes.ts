import { Router } from 'express';
import { createSensorController } from '@/controllers/sensor.controller';
import { SensorService } from '@/services/sensor.service';

export const createSensorRoutes = (sensorService: SensorService): Router => {
  const router = Router();
  const controller = createSensorController(sensorService);

  router.post('/save_data', controller.saveData);
  router.get('/get_all_data', controller.getAllData);
  router.get('/get_current_data', controller.getCurrentData);

  return router;
};
