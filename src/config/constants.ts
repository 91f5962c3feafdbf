export const SENSOR_FIELDS = [
  'temperature',
  'humidity',
  'soil_moisture',
  'gas_level',
  'ph_value',
  'soil_temperature',
  'light_intensity',
] as const;

export const COLLECTIONS = {
  SENSOR_DATA: 'sensor_records',
  CHAT_EXCHANGES: 'chat_exchanges',
} as const;

// LLM Configuration
export const LLM_CONFIG = {
  SYSTEM_PROMPT_TEMPLATE: 'agriculture-assistant.md',
  TEMPERATURE: 0.3,
  MAX_TOKENS: 1024,
} as const;

// Flammability heuristic: each factor is normalised to [0, 1] before weighting
export const FLAMMABILITY_CONFIG = {
  TEMPERATURE_RANGE_C: { min: 10, max: 45 },
  SOIL_MOISTURE_ADC_MAX: 1023,
  GAS_LEVEL_MAX: 1000,
  LIGHT_INTENSITY_MAX: 1000,
  WEIGHTS: {
    temperature: 0.3,
    air_dryness: 0.25,
    soil_dryness: 0.15,
    gas_level: 0.15,
    soil_temperature: 0.1,
    light_intensity: 0.05,
  },
  REMOTE_TIMEOUT_MS: 5000,
} as const;
