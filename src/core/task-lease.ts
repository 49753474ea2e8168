/**
 * Cross-process task leases. A lease is a lock file under the vault created
 * with O_EXCL (`flag: "wx"`), so of several processes racing for the same
 * task exactly one holds it. The file names its owner; a lease whose owner
 * process has exited on this host is stale and can be taken over.
 */
import { link, mkdir, readFile, rename, stat, unlink, writeFile } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { hostname } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";
import { errnoCode } from "./errors.js";

const LeaseOwnerSchema = z.object({
  pid: z.number().int().positive(),
  host: z.string(),
  acquiredAt: z.string(),
});

export type LeaseOwner = z.infer<typeof LeaseOwnerSchema>;

export interface Lease {
  key: string;
  release(): Promise<void>;
}

const MAX_TAKEOVERS = 3;
/** A lock file still unreadable after this long was abandoned mid-write. */
const UNREADABLE_GRACE_MS = 60_000;

export class TaskLeases {
  private clock: () => Date;

  constructor(
    private dir: string,
    private logger: Logger,
    clock?: () => Date
  ) {
    this.clock = clock ?? (() => new Date());
  }

  /** Take the lease on `key`, or return null while a live process holds it. */
  async acquire(key: string): Promise<Lease | null> {
    await mkdir(this.dir, { recursive: true });
    const path = this.pathFor(key);
    const owner: LeaseOwner = {
      pid: process.pid,
      host: hostname(),
      acquiredAt: this.clock().toISOString(),
    };

    for (let attempt = 0; attempt <= MAX_TAKEOVERS; attempt++) {
      try {
        await writeFile(path, JSON.stringify(owner), { encoding: "utf-8", flag: "wx" });
        return { key, release: () => this.release(key, path) };
      } catch (err) {
        if (errnoCode(err) !== "EEXIST") throw err;
      }

      const holder = await this.readOwner(path);
      if (holder === "absent") continue;
      if (holder === "unreadable") {
        if (!(await this.isAbandoned(path))) return null;
        if (!(await this.takeOver(path, null))) return null;
        continue;
      }
      if (isAlive(holder)) return null;
      if (!(await this.takeOver(path, holder))) return null;
    }

    return null;
  }

  /** Whether a live process currently holds the lease on `key`. */
  async isHeld(key: string): Promise<boolean> {
    const holder = await this.readOwner(this.pathFor(key));
    if (holder === "absent") return false;
    return holder === "unreadable" || isAlive(holder);
  }

  private pathFor(key: string): string {
    return join(this.dir, `${encodeURIComponent(key)}.lock`);
  }

  /**
   * Move a stale lock aside under a private name. Only one process wins the
   * rename; if the file moved aside turns out to belong to a live owner
   * (another process took over first), it is linked back without clobbering.
   */
  private async takeOver(path: string, stale: LeaseOwner | null): Promise<boolean> {
    const aside = `${path}.${process.pid}.${randomBytes(4).toString("hex")}.stale`;
    try {
      await rename(path, aside);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return true;
      throw err;
    }

    const moved = await this.readOwner(aside);
    if (moved !== "absent" && moved !== "unreadable" && isAlive(moved)) {
      try {
        await link(aside, path);
      } catch (err) {
        if (errnoCode(err) !== "EEXIST") throw err;
      }
      await unlink(aside);
      return false;
    }

    await unlink(aside);
    this.logger.warn({ lock: path, pid: stale?.pid, since: stale?.acquiredAt }, "Took over stale task lease");
    return true;
  }

  private async isAbandoned(path: string): Promise<boolean> {
    try {
      const info = await stat(path);
      return Date.now() - info.mtimeMs > UNREADABLE_GRACE_MS;
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return true;
      throw err;
    }
  }

  private async release(key: string, path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") throw err;
      this.logger.warn({ key }, "Task lease was already gone on release");
    }
  }

  private async readOwner(path: string): Promise<LeaseOwner | "absent" | "unreadable"> {
    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return "absent";
      throw err;
    }

    // A lock being written right now reads as empty
    try {
      const result = LeaseOwnerSchema.safeParse(JSON.parse(content));
      return result.success ? result.data : "unreadable";
    } catch {
      return "unreadable";
    }
  }
}

/** A pid on another host cannot be checked from here, so its owner counts as alive. */
function isAlive(owner: LeaseOwner): boolean {
  if (owner.host !== hostname()) return true;
  try {
    process.kill(owner.pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === "EPERM";
  }
}
