import { ChannelDeliveryFailedError } from '../shared/errors.js';
import { createLogger, type LoggerLike } from '../utils/logger.js';

export type DeliverFn = (text: string) => Promise<void>;

export interface ChannelRegistration {
  id: string;
  deliver: DeliverFn;
  active: boolean;
  registeredAt: string;
}

export interface FanoutReport {
  delivered: string[];
  failed: string[];
  skipped: string[];
}

/**
 * Best-effort broadcast to every registered channel. A failing channel is
 * logged and never affects the others or the caller.
 */
export class Notifier {
  private readonly registrations = new Map<string, ChannelRegistration>();
  private readonly logger: LoggerLike;

  constructor(logger?: LoggerLike) {
    this.logger = logger ?? createLogger('control.notifier');
  }

  register(id: string, deliver: DeliverFn) {
    const previous = this.registrations.get(id);
    if (previous) {
      previous.active = false;
    }

    const registration: ChannelRegistration = {
      id,
      deliver,
      active: true,
      registeredAt: new Date().toISOString(),
    };
    this.registrations.set(id, registration);
    this.logger.debug('channel registered', { id });

    return () => {
      if (this.registrations.get(id) === registration) {
        this.unregister(id);
      } else {
        registration.active = false;
      }
    };
  }

  unregister(id: string) {
    const registration = this.registrations.get(id);
    if (!registration) return false;
    registration.active = false;
    this.registrations.delete(id);
    this.logger.debug('channel unregistered', { id });
    return true;
  }

  list() {
    return Array.from(this.registrations.values()).map(({ id, active, registeredAt }) => ({ id, active, registeredAt }));
  }

  async fanout(text: string): Promise<FanoutReport> {
    const snapshot = Array.from(this.registrations.values());
    const report: FanoutReport = { delivered: [], failed: [], skipped: [] };

    await Promise.allSettled(
      snapshot.map(async (registration) => {
        // Deregistered after the snapshot was taken.
        if (!registration.active) {
          report.skipped.push(registration.id);
          return;
        }
        const ok = await this.attempt(registration.id, registration.deliver, text);
        (ok ? report.delivered : report.failed).push(registration.id);
      }),
    );

    this.logger.info('fanout complete', {
      delivered: report.delivered.length,
      failed: report.failed.length,
      skipped: report.skipped.length,
    });
    return report;
  }

  /** Delivers through an arbitrary callback with the same no-throw contract as fanout. */
  async deliver(channelId: string, deliver: DeliverFn, text: string) {
    return this.attempt(channelId, deliver, text);
  }

  private async attempt(channelId: string, deliver: DeliverFn, text: string) {
    try {
      await deliver(text);
      return true;
    } catch (cause) {
      const error = new ChannelDeliveryFailedError(channelId, cause);
      this.logger.warn(error.message, { channelId, code: error.code });
      return false;
    }
  }
}
