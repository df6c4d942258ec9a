import type { Dispatcher } from '../control/dispatcher.js';
import type { Notifier } from '../control/notifier.js';

export interface ChannelTransport {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface TransportDeps {
  dispatcher: Pick<Dispatcher, 'inbound'>;
  notifier: Notifier;
}
