import { Mutex } from "async-mutex";
import { Session } from "./session";

/**
 * Serializes access to a session shared between concurrent callers.
 * The session itself has no internal synchronization.
 */
export class SerializedSession {
  private mutex: Mutex = new Mutex();

  constructor(private session: Session) {}

  /**
   * Runs `work` with exclusive access to the session. Callers queue in
   * arrival order.
   */
  async runExclusive<T>(work: (session: Session) => T | Promise<T>): Promise<T> {
    return await this.mutex.runExclusive(() => work(this.session));
  }

  isBusy(): boolean {
    return this.mutex.isLocked();
  }
}
