const MINUTE = 60_000;
const WEEK = 7 * 24 * 60 * MINUTE;

export interface ProcessSample {
  rssBytes: number;
  heapUsedBytes: number;
  cpuUserMicros: number;
  cpuSystemMicros: number;
}

export interface ProcessRecord extends ProcessSample {
  time: number;
  cpuPercent: number;
}

export interface RecorderOptions {
  name: string;
  interval?: number;
  retention?: number;
  now?: () => number;
  sample?: () => ProcessSample;
}

export interface RecorderSnapshot {
  name: string;
  startedAt: number | null;
  interval: number;
  records: ProcessRecord[];
}

export function sampleProcess(): ProcessSample {
  const memory = process.memoryUsage();
  const cpu = process.cpuUsage();
  return {
    rssBytes: memory.rss,
    heapUsedBytes: memory.heapUsed,
    cpuUserMicros: cpu.user,
    cpuSystemMicros: cpu.system,
  };
}

/**
 * Samples memory and CPU of this process on a fixed interval and keeps the
 * records that fall inside the retention window.
 */
export class ProcessRecorder {
  private readonly records: ProcessRecord[] = [];
  private readonly interval: number;
  private readonly retention: number;
  private readonly now: () => number;
  private readonly sample: () => ProcessSample;
  private timer: NodeJS.Timeout | null = null;
  private startedAt: number | null = null;
  private last: ProcessRecord | null = null;

  constructor(private readonly options: RecorderOptions) {
    this.interval = options.interval ?? MINUTE;
    this.retention = options.retention ?? WEEK;
    this.now = options.now ?? Date.now;
    this.sample = options.sample ?? sampleProcess;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.startedAt = this.now();
    this.record();
    this.timer = setInterval(() => this.record(), this.interval);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  record(): ProcessRecord {
    const time = this.now();
    const sample = this.sample();
    let cpuPercent = 0;
    if (this.last && time > this.last.time) {
      const usedMicros =
        sample.cpuUserMicros - this.last.cpuUserMicros + (sample.cpuSystemMicros - this.last.cpuSystemMicros);
      cpuPercent = Math.round((usedMicros / ((time - this.last.time) * 1000)) * 10_000) / 100;
    }
    const entry: ProcessRecord = { ...sample, time, cpuPercent };
    this.records.push(entry);
    this.last = entry;

    const oldest = time - this.retention;
    while (this.records.length > 0 && this.records[0].time < oldest) {
      this.records.shift();
    }
    return entry;
  }

  snapshot(): RecorderSnapshot {
    return {
      name: this.options.name,
      startedAt: this.startedAt,
      interval: this.interval,
      records: [...this.records],
    };
  }
}
