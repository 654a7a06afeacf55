import { link, readFile, rm, writeFile } from 'node:fs/promises';
import { hostname } from 'node:os';
import type { Logger } from 'pino';
import { z } from 'zod';
import { AlreadyRunningError } from '../../domain/index.js';
import type { LockInfo } from '../../domain/index.js';
import type { AcquireOptions, InstanceLockPort, LockHandle } from '../../application/index.js';

export interface InstanceLockOptions {
  path: string;
  log: Logger;
  pid?: number | undefined;
  hostname?: string | undefined;
  isAlive?: ((pid: number) => boolean) | undefined;
  now?: (() => Date) | undefined;
}

export type LockInspection =
  | { readonly state: 'absent' }
  | { readonly state: 'live'; readonly info: LockInfo }
  | { readonly state: 'stale'; readonly info: LockInfo | null };

const lockInfoSchema = z.object({
  pid: z.number().int().positive(),
  hostname: z.string().default(''),
  started_at: z.string().default(''),
});

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * Signal-0 probe. `EPERM` means the process exists but belongs to
 * another user, which still counts as alive.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    return isErrno(err, 'EPERM');
  }
}

/**
 * Parses a lock record. Besides the JSON form, a bare pid (the format
 * older bridge versions wrote) is accepted. Anything else is `null`,
 * which callers treat as stale.
 */
export function parseLockRecord(content: string): LockInfo | null {
  const trimmed = content.trim();
  if (/^\d+$/.test(trimmed)) {
    const pid = Number(trimmed);
    return pid > 0 ? { pid, hostname: '', started_at: '' } : null;
  }

  try {
    const parsed = lockInfoSchema.safeParse(JSON.parse(trimmed));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Filesystem mutex allowing one bridge per deployment.
 *
 * Records are written to a temp file and hard-linked into place, so
 * creation fails if the record exists and readers never see a partial
 * write. When one exists, its holder is checked: a live holder means
 * `AlreadyRunningError`; a dead or unreadable one is reclaimed.
 *
 * Reclaiming runs under a `<path>.reclaim` marker created the same way,
 * so two starters that both found the same stale record cannot both
 * replace it.
 */
export class InstanceLock implements InstanceLockPort {
  private readonly pid: number;
  private readonly hostname: string;
  private readonly isAlive: (pid: number) => boolean;
  private readonly now: () => Date;

  constructor(private readonly options: InstanceLockOptions) {
    this.pid = options.pid ?? process.pid;
    this.hostname = options.hostname ?? hostname();
    this.isAlive = options.isAlive ?? isProcessAlive;
    this.now = options.now ?? (() => new Date());
  }

  get path(): string {
    return this.options.path;
  }

  private get markerPath(): string {
    return `${this.options.path}.reclaim`;
  }

  /**
   * @throws AlreadyRunningError if a live process holds the lock and
   *   `force` is not set, or another starter won the race for it.
   */
  async acquire(options: AcquireOptions = {}): Promise<LockHandle> {
    const { log } = this.options;
    const info = this.record();
    const body = JSON.stringify(info);

    if (await this.create(this.path, body)) {
      log.info({ pid: info.pid, path: this.path }, 'Acquired bridge lock');
      return this.handle(info);
    }

    const existing = await this.read(this.path);
    const holderAlive = existing !== null && this.isAlive(existing.pid);
    if (holderAlive) {
      if (options.force !== true) {
        log.warn({ pid: existing.pid, path: this.path }, 'Another bridge instance is running');
        throw new AlreadyRunningError(existing.pid, this.path);
      }
      log.warn({ pid: existing.pid, path: this.path }, 'Forcing takeover of a lock held by a live process');
    } else {
      log.info({ stalePid: existing?.pid ?? null, path: this.path }, 'Reclaiming stale bridge lock');
    }

    await this.withReclaimMarker(async () => {
      // The record may have changed hands since it was first read.
      const current = await this.read(this.path);
      if (current !== null && this.isAlive(current.pid) && !(holderAlive && sameHolder(current, existing))) {
        throw new AlreadyRunningError(current.pid, this.path);
      }

      await rm(this.path, { force: true });
      if (!(await this.create(this.path, body))) {
        const winner = await this.read(this.path);
        throw new AlreadyRunningError(winner?.pid ?? 0, this.path);
      }
    });

    log.info({ pid: info.pid, path: this.path }, 'Acquired bridge lock after reclaim');
    return this.handle(info);
  }

  async inspect(): Promise<LockInspection> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err: unknown) {
      if (isErrno(err, 'ENOENT')) return { state: 'absent' };
      throw err;
    }

    const info = parseLockRecord(content);
    if (info !== null && this.isAlive(info.pid)) return { state: 'live', info };
    return { state: 'stale', info };
  }

  /**
   * Removes a stale record.
   *
   * @returns false when there was nothing to remove.
   * @throws AlreadyRunningError if the holder is alive.
   */
  async reclaim(): Promise<boolean> {
    return this.withReclaimMarker(async () => {
      const inspection = await this.inspect();
      if (inspection.state === 'absent') return false;
      if (inspection.state === 'live') {
        throw new AlreadyRunningError(inspection.info.pid, this.path);
      }
      await rm(this.path, { force: true });
      this.options.log.info({ stalePid: inspection.info?.pid ?? null, path: this.path }, 'Removed stale bridge lock');
      return true;
    });
  }

  private record(): LockInfo {
    return { pid: this.pid, hostname: this.hostname, started_at: this.now().toISOString() };
  }

  private async read(path: string): Promise<LockInfo | null> {
    try {
      return parseLockRecord(await readFile(path, 'utf-8'));
    } catch (err: unknown) {
      if (isErrno(err, 'ENOENT')) return null;
      throw err;
    }
  }

  /** Creates `path` holding `body`; false if it already exists. */
  private async create(path: string, body: string): Promise<boolean> {
    const tmp = `${path}.${this.pid}.tmp`;
    await writeFile(tmp, body);
    try {
      await link(tmp, path);
      return true;
    } catch (err: unknown) {
      if (isErrno(err, 'EEXIST')) return false;
      throw err;
    } finally {
      await rm(tmp, { force: true });
    }
  }

  /**
   * Runs `action` while holding the reclaim marker. A marker left by a
   * dead process is removed and taken once.
   */
  private async withReclaimMarker<T>(action: () => Promise<T>): Promise<T> {
    const marker = this.markerPath;
    const body = JSON.stringify(this.record());

    if (!(await this.create(marker, body))) {
      const holder = await this.read(marker);
      if (holder !== null && this.isAlive(holder.pid)) {
        throw new AlreadyRunningError(holder.pid, this.path);
      }
      this.options.log.warn({ stalePid: holder?.pid ?? null, path: marker }, 'Removing abandoned lock reclaim marker');
      await rm(marker, { force: true });
      if (!(await this.create(marker, body))) {
        throw new AlreadyRunningError((await this.read(marker))?.pid ?? 0, this.path);
      }
    }

    try {
      return await action();
    } finally {
      await rm(marker, { force: true });
    }
  }

  private handle(info: LockInfo): LockHandle {
    let released = false;

    return {
      path: this.path,
      info,
      release: async () => {
        if (released) return;
        released = true;

        const current = await this.read(this.path);
        if (current === null || !sameHolder(current, info)) {
          this.options.log.warn({ path: this.path }, 'Lock record no longer ours, leaving it in place');
          return;
        }
        await rm(this.path, { force: true });
        this.options.log.info({ pid: info.pid }, 'Released bridge lock');
      },
    };
  }
}

function sameHolder(a: LockInfo, b: LockInfo | null): boolean {
  return b !== null && a.pid === b.pid && a.started_at === b.started_at;
}
