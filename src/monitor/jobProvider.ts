import type { JobInfo } from "../core/jobInfo.js";
import type { JobStatus } from "../core/jobStatus.js";
import type { Logger } from "../core/logger.js";
import type { UserScope } from "../config/config.js";
import type { ActiveJobFilter, Scheduler } from "../schedulers/types.js";

export interface ProviderFilter {
  userScope: UserScope;
  /** null: the active partition. */
  statuses: readonly JobStatus[] | null;
  queue: string | null;
}

export interface JobSnapshot {
  readonly jobs: readonly JobInfo[];
  readonly count: number;
  /** The filter the jobs were fetched with. */
  readonly filter: Readonly<ProviderFilter>;
  /** Time of the last successful refresh; null before the first one. */
  readonly refreshedAt: Date | null;
  /** Message of the last failed refresh; null once a refresh succeeds. */
  readonly error: string | null;
}

export type ProviderState = "idle" | "refreshing";

export type SnapshotListener = (snapshot: JobSnapshot) => void;

export interface JobProviderOptions {
  /** Username matched when the filter scope is `mine`. */
  currentUser: string;
  refreshIntervalSeconds: number;
  logger: Logger;
  filter?: Partial<ProviderFilter>;
  now?: () => Date;
}

function freezeFilter(filter: ProviderFilter): Readonly<ProviderFilter> {
  return Object.freeze({
    userScope: filter.userScope,
    statuses: filter.statuses ? Object.freeze([...filter.statuses]) : null,
    queue: filter.queue
  });
}

/** `3 my jobs`, `1 all job`. */
export function describeSnapshot(snapshot: JobSnapshot): string {
  const scope = snapshot.filter.userScope === "mine" ? "my" : "all";
  return `${snapshot.count} ${scope} job${snapshot.count === 1 ? "" : "s"}`;
}

/**
 * Polls `listActiveJobs` and publishes immutable snapshots. At most one refresh
 * runs at a time; requests that arrive meanwhile are dropped.
 */
export class JobProvider {
  private filter: Readonly<ProviderFilter>;
  private current: JobSnapshot;
  private inFlight: Promise<void> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private autoRefresh = true;
  private readonly listeners = new Set<SnapshotListener>();

  constructor(
    private readonly scheduler: Scheduler,
    private readonly options: JobProviderOptions
  ) {
    this.filter = freezeFilter({
      userScope: options.filter?.userScope ?? "mine",
      statuses: options.filter?.statuses ?? null,
      queue: options.filter?.queue ?? null
    });
    this.current = Object.freeze({ jobs: Object.freeze([]), count: 0, filter: this.filter, refreshedAt: null, error: null });
  }

  get state(): ProviderState {
    return this.inFlight ? "refreshing" : "idle";
  }

  get autoRefreshEnabled(): boolean {
    return this.autoRefresh;
  }

  snapshot(): JobSnapshot {
    return this.current;
  }

  currentFilter(): Readonly<ProviderFilter> {
    return this.filter;
  }

  /** Starts the timer and an immediate first refresh. */
  start(): void {
    if (this.timer) return;
    const ms = Math.max(1, Math.floor(this.options.refreshIntervalSeconds * 1000));
    this.timer = setInterval(() => {
      if (this.autoRefresh) void this.refreshNow();
    }, ms);
    this.timer.unref();
    void this.refreshNow();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  /** Pauses or resumes timer-driven refreshes; manual ones still run. */
  setAutoRefresh(enabled: boolean): void {
    this.autoRefresh = enabled;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Refreshes now without touching the timer. Resolves `false` when a refresh
   * is already running, otherwise `true` once this one (and any follow-up for a
   * filter changed meanwhile) has published.
   */
  async refreshNow(): Promise<boolean> {
    if (this.inFlight) return false;

    const filter = this.filter;
    const run = this.fetch(filter);
    this.inFlight = run;
    try {
      await run;
    } finally {
      this.inFlight = null;
    }

    if (this.filter !== filter) await this.refreshNow();
    return true;
  }

  /** Resolves when no refresh is running. */
  async whenIdle(): Promise<void> {
    while (this.inFlight) await this.inFlight;
  }

  /**
   * Replaces parts of the filter and refreshes. If a refresh is in flight the
   * new filter is fetched as soon as it finishes.
   */
  async setFilter(patch: Partial<ProviderFilter>): Promise<boolean> {
    this.filter = freezeFilter({ ...this.filter, ...patch });
    return this.refreshNow();
  }

  private toActiveFilter(filter: Readonly<ProviderFilter>): ActiveJobFilter {
    return {
      user: filter.userScope === "mine" ? this.options.currentUser : undefined,
      status: filter.statuses ? new Set(filter.statuses) : undefined,
      queue: filter.queue ?? undefined
    };
  }

  private async fetch(filter: Readonly<ProviderFilter>): Promise<void> {
    try {
      const jobs = await this.scheduler.listActiveJobs(this.toActiveFilter(filter));
      this.publish({
        jobs: Object.freeze([...jobs]),
        count: jobs.length,
        filter,
        refreshedAt: this.options.now ? this.options.now() : new Date(),
        error: null
      });
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.options.logger.warn(`refresh failed: ${message}`);
      this.publish({ ...this.current, error: message });
    }
  }

  private publish(snapshot: JobSnapshot): void {
    this.current = Object.freeze(snapshot);
    for (const listener of this.listeners) {
      try {
        listener(this.current);
      } catch (e) {
        this.options.logger.error(`snapshot listener failed: ${e instanceof Error ? e.message : String(e)}`);
      }
    }
  }
}
