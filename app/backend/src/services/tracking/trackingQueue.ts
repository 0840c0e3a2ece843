import { logger } from '../../logger';

export interface TrackingEvent {
  lines: string[];
  url: string;
}

export interface TrackingSink {
  enqueue(event: TrackingEvent): void;
}

interface TrackingJob {
  id: string;
  event: TrackingEvent;
  attempts: number;
}

interface TrackingQueueOptions {
  endpoint?: string;
  retries: number;
  maxQueued: number;
  fetchImpl?: typeof fetch;
}

/**
 * One-way delivery of tracking events. `enqueue` never waits and never
 * throws; failed deliveries are retried up to `retries` times, then dropped.
 * At most `maxQueued` events wait for delivery; anything beyond is dropped.
 */
export class TrackingQueue implements TrackingSink {
  private readonly queue: TrackingJob[] = [];
  private processing = false;
  private delivered = 0;
  private dropped = 0;

  constructor(private readonly options: TrackingQueueOptions) {}

  enqueue(event: TrackingEvent): void {
    if (!this.options.endpoint) {
      return;
    }
    const id = `track-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
    if (!this.admit({ id, event, attempts: 0 })) {
      return;
    }
    this.tick().catch((error) => {
      logger.error(`[Tracking] Queue stopped: ${(error as Error).message}`);
    });
  }

  getMetrics() {
    return {
      queued: this.queue.length,
      delivered: this.delivered,
      dropped: this.dropped,
    };
  }

  private admit(job: TrackingJob): boolean {
    if (this.queue.length >= this.options.maxQueued) {
      this.dropped += 1;
      logger.debug(`[Tracking] Queue full, dropped ${job.id}`);
      return false;
    }
    this.queue.push(job);
    return true;
  }

  private async tick() {
    if (this.processing) return;
    this.processing = true;
    try {
      while (this.queue.length > 0) {
        const job = this.queue.shift();
        if (!job) continue;
        await this.processJob(job);
      }
    } finally {
      this.processing = false;
    }
  }

  private async processJob(job: TrackingJob) {
    const fetchImpl = this.options.fetchImpl ?? fetch;
    try {
      const response = await fetchImpl(this.options.endpoint ?? '', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: job.event.lines.join(' '), source: 'memesmith', context: job.event.url }),
        signal: AbortSignal.timeout(5000),
      });
      if (!response.ok) {
        throw new Error(`endpoint responded ${response.status}`);
      }
      this.delivered += 1;
      logger.debug(`[Tracking] Delivered ${job.id}`);
    } catch (error) {
      job.attempts += 1;
      logger.warn(`[Tracking] Event ${job.id} failed: ${(error as Error).message}`);
      if (job.attempts <= this.options.retries) {
        this.admit(job);
      } else {
        this.dropped += 1;
      }
    }
  }
}
