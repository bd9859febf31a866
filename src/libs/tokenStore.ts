import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { TokenFile, TokenRecord } from "../types/token";
import { getAppLogger } from "../logger";
import { StorageError, errorMessage } from "../utils/errors";

const tokenRecordSchema = z
  .object({
    open_id: z.string(),
    access_token: z.string(),
    refresh_token: z.string(),
    expires_in: z.number().optional(),
    refresh_expires_in: z.number().optional(),
    expires_in_datetime: z.string().optional(),
    refresh_expires_in_datetime: z.string().optional(),
    scope: z.string().optional(),
    token_type: z.string().optional(),
  })
  .passthrough();

const tokenFileSchema = z.record(z.unknown());

/** 生のファイル内容（エントリ単位でしか検証しない） */
type RawTokenFile = Record<string, unknown>;

const logger = getAppLogger("tokens");

/**
 * ユーザーごとのトークン保存先
 */
export interface TokenStore {
  get(openId: string): Promise<TokenRecord | null>;
  put(record: TokenRecord): Promise<void>;
  list(): Promise<TokenRecord[]>;
}

/**
 * JSON ファイルに保存するトークンストア
 * 書き込みはプロセス内で直列化する（プロセス間のロックはない）
 * 不正なエントリはスキップし、他のユーザーの読み書きは止めない
 */
export class FileTokenStore implements TokenStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async get(openId: string): Promise<TokenRecord | null> {
    const data = await this.loadRaw();
    if (!Object.hasOwn(data, openId)) {
      return null;
    }
    return parseEntry(openId, data[openId]);
  }

  async put(record: TokenRecord): Promise<void> {
    await this.serialize(async () => {
      const data = await this.loadRaw();
      data[record.open_id] = record;
      await this.save(data);
    });
  }

  async list(): Promise<TokenRecord[]> {
    return Object.values(await this.load());
  }

  /**
   * 有効なエントリだけを読み込む（存在しなければ空）
   */
  async load(): Promise<TokenFile> {
    const data: TokenFile = {};
    for (const [key, entry] of Object.entries(await this.loadRaw())) {
      const record = parseEntry(key, entry);
      if (record) data[key] = record;
    }
    return data;
  }

  private async loadRaw(): Promise<RawTokenFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isFileNotFound(error)) {
        return {};
      }
      throw new StorageError(
        `Failed to read token file: ${errorMessage(error)}`
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(
        `Token file is not valid JSON: ${errorMessage(error)}`
      );
    }

    const result = tokenFileSchema.safeParse(json);
    if (!result.success) {
      throw new StorageError(
        `Token file must be a JSON object keyed by open_id: ${result.error.message}`
      );
    }
    return result.data;
  }

  /**
   * 一時ファイル → rename で書き込む
   */
  private async save(data: RawTokenFile): Promise<void> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.tmp`;
      await writeFile(tempPath, JSON.stringify(data, null, 4), {
        mode: 0o600,
      });
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new StorageError(
        `Failed to write token file: ${errorMessage(error)}`
      );
    }
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}

/**
 * メモリ上のトークンストア
 */
export class MemoryTokenStore implements TokenStore {
  private readonly records = new Map<string, TokenRecord>();

  constructor(initial: TokenRecord[] = []) {
    for (const record of initial) {
      this.records.set(record.open_id, record);
    }
  }

  async get(openId: string): Promise<TokenRecord | null> {
    return this.records.get(openId) ?? null;
  }

  async put(record: TokenRecord): Promise<void> {
    this.records.set(record.open_id, record);
  }

  async list(): Promise<TokenRecord[]> {
    return [...this.records.values()];
  }
}

function parseEntry(key: string, entry: unknown): TokenRecord | null {
  const result = tokenRecordSchema.safeParse(entry);
  if (!result.success) {
    logger.warn("Skipping malformed token entry {key}: {issues}", {
      key,
      issues: result.error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join(", "),
    });
    return null;
  }
  return result.data;
}

function isFileNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
