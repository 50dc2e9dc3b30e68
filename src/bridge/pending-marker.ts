export interface PendingRequest {
  owner: string;
  since: number;
}

/**
 * "A request was dispatched and a reply is awaited." One at a time; a newer
 * dispatch replaces the older marker.
 */
export class PendingMarker {
  private current: PendingRequest | null = null;

  constructor(
    private timeoutMs: number,
    private now: () => number = Date.now,
  ) {}

  set(owner: string): PendingRequest {
    this.current = { owner, since: this.now() };
    return this.current;
  }

  get(): PendingRequest | null {
    return this.current;
  }

  isSet(owner?: string): boolean {
    if (!this.current) return false;
    return owner === undefined || this.current.owner === owner;
  }

  isExpired(): boolean {
    if (!this.current) return false;
    return this.now() - this.current.since >= this.timeoutMs;
  }

  /** Age in ms of the current marker, 0 when none is set */
  age(): number {
    return this.current ? this.now() - this.current.since : 0;
  }

  clear(): void {
    this.current = null;
  }
}
