/**
 * Users allowed to run analysis commands beyond chat admins.
 *
 * The primary user is always allowed and is the only one who can grant or
 * revoke. Mutations are serialized through `op` and persisted with an atomic
 * rename, so concurrent /grant and /revoke commands apply one at a time.
 */

import fs from "node:fs";
import path from "node:path";
import JSON5 from "json5";
import { createLogger } from "../utils/logger.js";

const log = createLogger("access");

interface AccessFile {
  version: 1;
  userIds: number[];
}

export interface AccessListOptions {
  primaryUserId?: number;
  /** When absent, grants only live for this process. */
  storePath?: string;
}

export class AccessList {
  private readonly primaryUserId: number | undefined;
  private readonly storePath: string | undefined;
  private readonly users = new Set<number>();
  private op: Promise<void> = Promise.resolve();

  private constructor(opts: AccessListOptions, initial: Iterable<number>) {
    this.primaryUserId = opts.primaryUserId;
    this.storePath = opts.storePath ? path.resolve(opts.storePath) : undefined;
    for (const id of initial) this.users.add(id);
  }

  static async load(opts: AccessListOptions): Promise<AccessList> {
    if (!opts.storePath) return new AccessList(opts, []);
    return new AccessList(opts, await readUserIds(path.resolve(opts.storePath)));
  }

  contains(userId: number): boolean {
    return this.isPrimary(userId) || this.users.has(userId);
  }

  isPrimary(userId: number): boolean {
    return this.primaryUserId !== undefined && userId === this.primaryUserId;
  }

  list(): number[] {
    return Array.from(this.users).sort((a, b) => a - b);
  }

  /** Returns false when the user was already present. */
  add(userId: number): Promise<boolean> {
    return this.locked(async () => {
      if (this.contains(userId)) return false;
      this.users.add(userId);
      await this.persist();
      log.info({ userId }, "access granted");
      return true;
    });
  }

  /** Returns false when the user was absent. The primary user cannot be removed. */
  remove(userId: number): Promise<boolean> {
    return this.locked(async () => {
      if (this.isPrimary(userId) || !this.users.has(userId)) return false;
      this.users.delete(userId);
      await this.persist();
      log.info({ userId }, "access revoked");
      return true;
    });
  }

  private locked<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.op.then(fn);
    // Keep the chain alive after a failed operation; the caller still sees the error.
    this.op = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async persist(): Promise<void> {
    if (!this.storePath) return;
    const data: AccessFile = { version: 1, userIds: this.list() };
    await fs.promises.mkdir(path.dirname(this.storePath), { recursive: true });

    const tmp = `${this.storePath}.${process.pid}.${Math.random().toString(16).slice(2)}.tmp`;
    await fs.promises.writeFile(tmp, JSON.stringify(data, null, 2), "utf-8");
    await fs.promises.rename(tmp, this.storePath);
  }
}

async function readUserIds(storePath: string): Promise<number[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(storePath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  }

  const parsed: unknown = JSON5.parse(raw);
  const ids: unknown[] =
    typeof parsed === "object" && parsed !== null && "userIds" in parsed && Array.isArray(parsed.userIds)
      ? parsed.userIds
      : [];
  const valid = ids.filter((id): id is number => typeof id === "number" && Number.isSafeInteger(id) && id > 0);
  if (valid.length !== ids.length) {
    log.warn({ storePath, dropped: ids.length - valid.length }, "ignored invalid user ids");
  }
  return valid;
}
