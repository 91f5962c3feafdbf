import request from 'supertest';
import { Express } from 'express';
import { createApp } from '@/app';
import { createChatClient } from '@/services/llm.service';
import { createChatService } from '@/services/chat.service';
import { heuristicPredictor } from '@/services/prediction.service';
import { createSensorService } from '@/services/sensor.service';
import { SensorRecord } from '@/types/sensor.types';
import { InMemoryChatRepository, InMemorySensorRepository, steppingClock } from '../helpers/in-memory.repositories';
import { readingWithout, stationReading } from '../helpers/fixtures';

describe('Sensor Data Integration', () => {
  let repository: InMemorySensorRepository;
  let app: Express;

  beforeEach(() => {
    repository = new InMemorySensorRepository();
    app = createApp({
      sensorService: createSensorService({
        repository,
        predictor: heuristicPredictor,
        clock: steppingClock('2026-03-01T06:00:00.000Z'),
      }),
      chatService: createChatService({
        client: createChatClient({ http: { post: jest.fn() }, model: 'test-model', systemPrompt: 'test prompt' }),
        repository: new InMemoryChatRepository(),
      }),
      isDatabaseConnected: () => true,
    });
  });

  const save = (device_id: string, data: object = stationReading) =>
    request(app).post('/save_data').send({ device_id, data });

  describe('POST /save_data', () => {
    test('should store the reading and answer success', async () => {
      const res = await save('station-01').expect(200);

      expect(res.body).toEqual({ status: 'success' });
      expect(repository.records).toHaveLength(1);
      expect(repository.records[0].data).toEqual(stationReading);
    });

    test('should fail without persisting when a sensor field is missing', async () => {
      const res = await save('station-01', readingWithout('soil_moisture')).expect(500);

      expect(res.body).toEqual({ status: 'failed' });
      expect(repository.records).toHaveLength(0);
    });

    test('should fail on malformed JSON', async () => {
      const res = await request(app)
        .post('/save_data')
        .set('Content-Type', 'application/json')
        .send('{"device_id": "station-01", "data": ')
        .expect(500);

      expect(res.body).toEqual({ status: 'failed' });
      expect(repository.records).toHaveLength(0);
    });

    test('should fail when numbers arrive as strings', async () => {
      await save('station-01', { ...stationReading, temperature: '26.4' }).expect(500);
      expect(repository.records).toHaveLength(0);
    });

    test('should fail without persisting when the database is unreachable', async () => {
      const networkError = new Error('connect ECONNREFUSED 127.0.0.1:27017');
      networkError.name = 'MongoNetworkError';
      repository.failWith = networkError;

      const res = await save('station-01').expect(500);

      expect(res.body).toEqual({ status: 'failed' });
      expect(repository.records).toHaveLength(0);
    });
  });

  describe('GET /get_current_data', () => {
    test('should return the saved reading with a server timestamp and prediction', async () => {
      await save('station-01').expect(200);

      const res = await request(app).get('/get_current_data').expect(200);

      expect(res.body).toEqual({
        _id: expect.any(String),
        device_id: 'station-01',
        timestamp: '2026-03-01T06:00:00.000Z',
        data: stationReading,
        prediction: 41,
      });
    });

    test('should return the record with the latest timestamp', async () => {
      await save('station-01').expect(200);
      await save('station-02').expect(200);
      await save('station-01', { ...stationReading, temperature: 30 }).expect(200);

      const res = await request(app).get('/get_current_data').expect(200);
      const timestamps = repository.records.map(record => record.timestamp).sort();

      expect(res.body.timestamp).toBe(timestamps[timestamps.length - 1]);
      expect(res.body.timestamp).toBe('2026-03-01T06:02:00.000Z');
      expect(res.body.data.temperature).toBe(30);
    });

    test('should answer 404 when nothing is stored', async () => {
      const res = await request(app).get('/get_current_data').expect(404);
      expect(res.body).toEqual({ status: 'failed' });
    });
  });

  describe('GET /get_all_data', () => {
    test('should list every record newest first', async () => {
      await save('station-01').expect(200);
      await save('station-02').expect(200);
      await save('station-01').expect(200);

      const res = await request(app).get('/get_all_data').expect(200);
      const records: SensorRecord[] = res.body;

      expect(records.map(record => record.timestamp)).toEqual([
        '2026-03-01T06:02:00.000Z',
        '2026-03-01T06:01:00.000Z',
        '2026-03-01T06:00:00.000Z',
      ]);
      expect(records.map(record => record.device_id)).toEqual(['station-01', 'station-02', 'station-01']);
      for (let i = 1; i < records.length; i++) {
        expect(records[i - 1].timestamp >= records[i].timestamp).toBe(true);
      }
    });

    test('should return an empty array when nothing is stored', async () => {
      const res = await request(app).get('/get_all_data').expect(200);
      expect(res.body).toEqual([]);
    });

    test('should fail when the database errors', async () => {
      repository.failWith = new Error('cursor killed');

      const res = await request(app).get('/get_all_data').expect(500);
      expect(res.body).toEqual({ status: 'failed' });
    });
  });

  describe('service routes', () => {
    test('GET / should answer with the banner', async () => {
      const res = await request(app).get('/').expect(200);
      expect(res.text).toBe('<p>Agro-tech Backend is running!</p>');
    });

    test('GET /health should report the database state', async () => {
      const res = await request(app).get('/health').expect(200);
      expect(res.body).toEqual({ status: 'ok', database: 'connected', timestamp: expect.any(String) });
    });

    test('unknown routes should answer 404 failed', async () => {
      const res = await request(app).get('/get_some_data').expect(404);
      expect(res.body).toEqual({ status: 'failed' });
    });
  });
});
