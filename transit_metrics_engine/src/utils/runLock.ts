import { randomUUID } from "crypto";
import type Redis from "ioredis";
import { RunLockError } from "./errors";

type RunLockOptions = {
  keydb: Redis;
  ttlMs: number;
};

// delete only while the key still holds this holder's token
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

export function runLockKey(serviceDate: string): string {
  return `metrics:lock:${serviceDate}`;
}

/** One batch run per service date across processes. */
export function createRunLock(options: RunLockOptions) {
  async function acquire(serviceDate: string): Promise<() => Promise<void>> {
    const key = runLockKey(serviceDate);
    const token = randomUUID();
    const result = await options.keydb.set(key, token, "PX", options.ttlMs, "NX");
    if (result !== "OK") {
      throw new RunLockError(serviceDate);
    }

    return async () => {
      const released = await options.keydb.eval(RELEASE_SCRIPT, 1, key, token);
      if (released !== 1) {
        console.warn("[run-lock] lock expired before release", { serviceDate });
      }
    };
  }

  return { acquire };
}
