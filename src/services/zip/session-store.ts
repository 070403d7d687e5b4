import { inspect, type InspectionSession, type InspectOptions } from './inspector';

/**
 * In-memory sessions keyed by archive location.
 * Concurrent requests for the same location share one inspection; a failed
 * inspection is forgotten so the next request tries again.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Promise<InspectionSession>>();

  constructor(private readonly options: InspectOptions = {}) {}

  get(location: string): Promise<InspectionSession> {
    const existing = this.sessions.get(location);
    if (existing) {
      return existing;
    }

    const task: Promise<InspectionSession> = inspect(location, this.options).catch((error: unknown) => {
      if (this.sessions.get(location) === task) {
        this.sessions.delete(location);
      }
      throw error;
    });
    this.sessions.set(location, task);
    return task;
  }

  /** Drop a session; the next `get` inspects the archive again */
  forget(location: string): boolean {
    return this.sessions.delete(location);
  }

  get size(): number {
    return this.sessions.size;
  }
}
