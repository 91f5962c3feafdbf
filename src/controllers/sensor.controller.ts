import { NextFunction, Request, Response } from 'express';
import { SensorService } from '@/services/sensor.service';
import { SaveDataResponse, SensorRecord } from '@/types/sensor.types';

export const createSensorController = (sensorService: SensorService) => ({
  saveData: async (req: Request, res: Response<SaveDataResponse>, next: NextFunction): Promise<void> => {
    try {
      await sensorService.saveReading(req.body);
      res.status(200).json({ status: 'success' });
    } catch (error) {
      next(error);
    }
  },

  getAllData: async (req: Request, res: Response<SensorRecord[]>, next: NextFunction): Promise<void> => {
    try {
      const readings = await sensorService.getAllReadings();
      res.status(200).json(readings);
    } catch (error) {
      next(error);
    }
  },

  getCurrentData: async (req: Request, res: Response<SensorRecord>, next: NextFunction): Promise<void> => {
    try {
      const reading = await sensorService.getCurrentReading();
      res.status(200).json(reading);
    } catch (error) {
      next(error);
    }
  },
});
