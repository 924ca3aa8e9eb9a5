import type { BackgroundGuard } from "../types.js";

const HEARTBEAT_MS = 60_000;

export interface KeepAliveHost {
  hold(): () => void;
}

const nodeKeepAliveHost: KeepAliveHost = {
  hold() {
    const handle = setInterval(() => undefined, HEARTBEAT_MS);
    return () => clearInterval(handle);
  }
};

/**
 * Holds a referenced Node timer while a sequence runs, so the event loop stays up even
 * when the (unreferenced) tick loop is the only other work left.
 */
export class ProcessKeepAlive implements BackgroundGuard {
  private releaseHandle: (() => void) | null = null;

  constructor(private readonly host: KeepAliveHost = nodeKeepAliveHost) {}

  get held(): boolean {
    return this.releaseHandle !== null;
  }

  acquire(): void {
    this.release();
    this.releaseHandle = this.host.hold();
  }

  release(): void {
    if (this.releaseHandle) {
      this.releaseHandle();
      this.releaseHandle = null;
    }
  }
}
