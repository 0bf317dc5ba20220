import type { NetworkEndpoint } from '../types.js';

export class EndpointPool {
  private inUse = new Set<number>();

  constructor(
    readonly host: string,
    private readonly start: number,
    private readonly end: number,
  ) {
    if (end < start) {
      throw new RangeError(`Invalid port range ${start}-${end}`);
    }
  }

  /** Lowest free port in the range, or null when the range is exhausted. */
  acquire(): NetworkEndpoint | null {
    for (let port = this.start; port <= this.end; port += 1) {
      if (!this.inUse.has(port)) {
        this.inUse.add(port);
        return { host: this.host, port };
      }
    }
    return null;
  }

  release(port: number): void {
    this.inUse.delete(port);
  }

  isInUse(port: number): boolean {
    return this.inUse.has(port);
  }

  get available(): number {
    return this.end - this.start + 1 - this.inUse.size;
  }
}
