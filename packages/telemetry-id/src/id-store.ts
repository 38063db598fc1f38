import { randomBytes } from "node:crypto";
import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { endianness } from "node:os";
import { dirname, join } from "node:path";
import { getUserConfigDir } from "@diagkit/core";
import { createLogger } from "@diagkit/logger";

const log = createLogger("telemetry-id");

export const TELEMETRY_ID_FILENAME = "telemetry_id";

/** Size of the on-disk record: one unsigned 64-bit integer. */
export const TELEMETRY_ID_BYTES = 8;

const LITTLE_ENDIAN = endianness() === "LE";

export type IdGenerator = () => bigint;

export function getTelemetryIdPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getUserConfigDir(env), TELEMETRY_ID_FILENAME);
}

/** Draw a random identifier from the system CSPRNG. */
export function generateTelemetryId(): bigint {
  return decodeId(randomBytes(TELEMETRY_ID_BYTES));
}

/** Encode an identifier as raw bytes in host byte order. */
export function encodeId(id: bigint): Buffer {
  const buf = Buffer.alloc(TELEMETRY_ID_BYTES);
  if (LITTLE_ENDIAN) {
    buf.writeBigUInt64LE(BigInt.asUintN(64, id));
  } else {
    buf.writeBigUInt64BE(BigInt.asUintN(64, id));
  }
  return buf;
}

export function decodeId(buf: Buffer): bigint {
  if (buf.length < TELEMETRY_ID_BYTES) {
    throw new Error(`telemetry id record is ${buf.length} bytes, expected ${TELEMETRY_ID_BYTES}`);
  }
  return LITTLE_ENDIAN ? buf.readBigUInt64LE(0) : buf.readBigUInt64BE(0);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Durable anonymous per-installation identifier.
 *
 * The value lives in a single file holding exactly eight bytes. It is
 * created on the first read and only replaced by `regenerateId()`.
 * Every failure is logged and reported as the zero id; nothing throws.
 *
 * Reads and writes are synchronous and nothing is cached between calls.
 * Concurrent processes are not coordinated.
 */
export class TelemetryIdStore {
  readonly filePath: string;
  private readonly generate: IdGenerator;

  constructor(options: { filePath?: string; generate?: IdGenerator } = {}) {
    this.filePath = options.filePath ?? getTelemetryIdPath();
    this.generate = options.generate ?? generateTelemetryId;
  }

  getId(): bigint {
    let data: Buffer;
    try {
      data = readFileSync(this.filePath);
    } catch (err) {
      if (isNotFound(err)) {
        return this.create();
      }
      log.error(`failed to open telemetry_id: ${this.filePath}: ${describeError(err)}`);
      return 0n;
    }

    try {
      return decodeId(data);
    } catch (err) {
      log.error(`failed to read telemetry_id: ${this.filePath}: ${describeError(err)}`);
      return 0n;
    }
  }

  regenerateId(): bigint {
    const id = this.generate();
    try {
      this.write(id);
    } catch (err) {
      log.error(`failed to open telemetry_id: ${this.filePath}: ${describeError(err)}`);
      return 0n;
    }
    log.info("telemetry id regenerated");
    return id;
  }

  private create(): bigint {
    const id = this.generate();
    try {
      this.write(id);
    } catch (err) {
      log.error(`failed to open telemetry_id: ${this.filePath}: ${describeError(err)}`);
      return 0n;
    }
    log.debug(`created telemetry id at ${this.filePath}`);
    return id;
  }

  /** Write to a sibling temp file, then rename over the target. */
  private write(id: bigint): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      writeFileSync(tmpPath, encodeId(id));
      renameSync(tmpPath, this.filePath);
    } catch (err) {
      rmSync(tmpPath, { force: true });
      throw err;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

let defaultStore: TelemetryIdStore | null = null;

function getDefaultStore(): TelemetryIdStore {
  defaultStore ??= new TelemetryIdStore();
  return defaultStore;
}

/** Read (or lazily create) the identifier at the default location. */
export function getTelemetryId(): bigint {
  return getDefaultStore().getId();
}

/** Replace the identifier at the default location. */
export function regenerateTelemetryId(): bigint {
  return getDefaultStore().regenerateId();
}
