import { SensorData, SensorField } from '@/types/sensor.types';

export const stationReading: SensorData = {
  temperature: 26.4,
  humidity: 61,
  soil_moisture: 432,
  gas_level: 230,
  ph_value: 6.7,
  soil_temperature: 23.5,
  light_intensity: 320,
};

export const readingWithout = (field: SensorField): Partial<SensorData> => {
  const reading: Partial<SensorData> = { ...stationReading };
  delete reading[field];
  return reading;
};

export const completionResponse = (content: string | null) => ({
  id: 'chatcmpl-test',
  choices: [
    {
      message: { role: 'assistant', content },
      finish_reason: 'stop',
    },
  ],
  usage: { prompt_tokens: 120, completion_tokens: 40, total_tokens: 160 },
  created: 1767225600,
});
