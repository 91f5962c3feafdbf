import { SensorRepository } from '@/database/sensor.repository';
import { ChatRepository } from '@/database/chat.repository';
import { ChatExchange } from '@/types/chat.types';
import { NewSensorRecord, SensorRecord } from '@/types/sensor.types';

const newestFirst = (a: SensorRecord, b: SensorRecord): number =>
  b.timestamp.localeCompare(a.timestamp) || b._id.localeCompare(a._id);

/** Stand-in for the Data collection; set `failWith` to simulate an unreachable database. */
export class InMemorySensorRepository implements SensorRepository {
  readonly records: SensorRecord[] = [];
  failWith?: Error;
  private sequence = 0;

  async insertOne(record: NewSensorRecord): Promise<SensorRecord> {
    this.throwIfFailing();
    this.sequence += 1;
    const stored: SensorRecord = {
      _id: this.sequence.toString(16).padStart(24, '0'),
      device_id: record.device_id,
      timestamp: record.timestamp.toISOString(),
      data: { ...record.data },
      prediction: record.prediction,
    };
    this.records.push(stored);
    return stored;
  }

  async findAll(): Promise<SensorRecord[]> {
    this.throwIfFailing();
    return [...this.records].sort(newestFirst);
  }

  async findLatest(): Promise<SensorRecord | null> {
    const all = await this.findAll();
    return all[0] ?? null;
  }

  private throwIfFailing(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

export class InMemoryChatRepository implements ChatRepository {
  readonly exchanges: ChatExchange[] = [];

  async recordExchange(exchange: ChatExchange): Promise<void> {
    this.exchanges.push(exchange);
  }
}

/** Clock that advances one minute per call, starting at `start`. */
export const steppingClock = (start: string): (() => Date) => {
  let next = new Date(start).getTime();
  return () => {
    const now = new Date(next);
    next += 60_000;
    return now;
  };
};
