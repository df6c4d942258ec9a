import type { SessionManager } from '../control/session-manager.js';
import type { MonitorScheduler } from '../monitor/scheduler.js';

/**
 * Stops scheduled checks and cancels every invocation. The monitor stops
 * first so no new check starts, but its in-flight runs are only awaited after
 * the session manager has canceled their invocations.
 */
export const stopBackgroundWork = async (work: {
  sessions: Pick<SessionManager, 'shutdown'>;
  monitor?: Pick<MonitorScheduler, 'stop'>;
}) => {
  const monitorStopped = work.monitor?.stop();
  await work.sessions.shutdown();
  await monitorStopped;
};
