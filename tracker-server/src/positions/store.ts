import { randomBytes } from "node:crypto";
import { readFile, writeFile } from "node:fs/promises";
import { getStoreConfig } from "../utils/config.js";
import { InvalidPositionError, PositionNotFoundError } from "../utils/errors.js";
import { log } from "../utils/logger.js";
import { closingProfitLoss } from "./analytics.js";
import {
  assertDateOrder,
  parsePositionRecord,
  type CreatePositionInput,
  type Position,
} from "./types.js";

export type StatusFilter = "open" | "closed" | "all";

/** `null` clears the field. */
export interface PositionPatch {
  sector?: string | null;
  notes?: string | null;
}

export interface ClosePositionInput {
  close_price: number;
  close_date?: Date;
  notes?: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Position book. Held in memory; mirrored to a JSON file after every
 * mutation when a file path is configured.
 */
export class PositionStore {
  private readonly positions = new Map<string, Position>();
  private loading: Promise<void> | null = null;
  private writing: Promise<void> = Promise.resolve();

  constructor(private readonly filePath?: string) {}

  async list(status: StatusFilter = "all"): Promise<Position[]> {
    await this.ensureLoaded();
    const all = [...this.positions.values()];
    if (status === "all") return all;
    return all.filter((p) => p.status === status);
  }

  async listOpen(): Promise<Position[]> {
    await this.ensureLoaded();
    return [...this.positions.values()].filter((p) => p.is_open);
  }

  async find(id: string): Promise<Position | undefined> {
    await this.ensureLoaded();
    return this.positions.get(id);
  }

  async get(id: string): Promise<Position> {
    const position = await this.find(id);
    if (!position) throw new PositionNotFoundError(id);
    return position;
  }

  async create(input: CreatePositionInput): Promise<Position> {
    await this.ensureLoaded();
    assertDateOrder(input.entry_date, input.expiration_date);

    const position: Position = {
      ...input,
      id: `pos_${randomBytes(8).toString("hex")}`,
      symbol: input.symbol.toUpperCase(),
      is_open: true,
      status: "open",
    };
    this.positions.set(position.id, position);
    await this.persist();
    log(`Created position ${position.id} (${position.strategy} ${position.symbol})`);
    return position;
  }

  /** Inserts or replaces a position under its own id. */
  async upsert(position: Position): Promise<Position> {
    await this.ensureLoaded();
    assertDateOrder(position.entry_date, position.expiration_date);
    this.positions.set(position.id, position);
    await this.persist();
    return position;
  }

  async update(id: string, patch: PositionPatch): Promise<Position> {
    const existing = await this.get(id);
    const updated: Position = { ...existing };
    if (patch.sector === null) delete updated.sector;
    else if (patch.sector !== undefined) updated.sector = patch.sector;
    if (patch.notes === null) delete updated.notes;
    else if (patch.notes !== undefined) updated.notes = patch.notes;
    this.positions.set(id, updated);
    await this.persist();
    return updated;
  }

  async close(id: string, input: ClosePositionInput): Promise<Position> {
    const existing = await this.get(id);
    if (existing.status === "closed") {
      throw new InvalidPositionError(`Position ${id} is already closed`);
    }

    const closed: Position = {
      ...existing,
      status: "closed",
      is_open: false,
      close_price: input.close_price,
      close_date: input.close_date ?? new Date(),
      profit_loss: closingProfitLoss(existing, input.close_price),
      notes: input.notes ?? existing.notes,
    };
    this.positions.set(id, closed);
    await this.persist();
    log(`Closed position ${id} (P&L $${closed.profit_loss?.toFixed(2)})`);
    return closed;
  }

  async delete(id: string): Promise<void> {
    await this.get(id);
    this.positions.delete(id);
    await this.persist();
    log(`Deleted position ${id}`);
  }

  /**
   * Loads the file once. A failed load leaves the book empty and is retried
   * on the next call, so nothing is written back until the file parses.
   */
  private ensureLoaded(): Promise<void> {
    this.loading ??= this.load().catch((error: unknown) => {
      this.loading = null;
      throw error;
    });
    return this.loading;
  }

  private async load(): Promise<void> {
    if (!this.filePath) return;

    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }

    const raw: unknown = JSON.parse(text);
    if (!Array.isArray(raw)) {
      throw new InvalidPositionError(`${this.filePath} must contain a JSON array of positions`);
    }
    const loaded = new Map<string, Position>();
    for (const record of raw) {
      const position = parsePositionRecord(record);
      loaded.set(position.id, position);
    }

    this.positions.clear();
    for (const [id, position] of loaded) this.positions.set(id, position);
    log(`Loaded ${this.positions.size} positions from ${this.filePath}`);
  }

  /**
   * Snapshots the book now and writes it after any write already queued.
   */
  private persist(): Promise<void> {
    const filePath = this.filePath;
    if (!filePath) return Promise.resolve();

    const text = JSON.stringify([...this.positions.values()], null, 2);
    const write = this.writing.then(() => writeFile(filePath, text, "utf8"));
    // The caller receives the failure through `write`; the queue moves on.
    this.writing = write.catch(() => undefined);
    return write;
  }
}

let _store: PositionStore | null = null;

export function getPositionStore(): PositionStore {
  if (!_store) _store = new PositionStore(getStoreConfig().positionsFile);
  return _store;
}
