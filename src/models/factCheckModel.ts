import mongoose, { Schema } from 'mongoose';
import { CacheEntry, FactCheckResult } from '../interfaces/factCheckResult';
import { factCheckResultSchema } from '../interfaces/schemas';
import { logWarn } from '../utils/logger';

export interface FactCheckDocument {
  key: string;
  normalizedText: string;
  verdict: string;
  severity: string;
  resultJson: string;
  expiresAt: Date;
}

const factCheckSchema = new Schema<FactCheckDocument>(
  {
    key: { type: String, required: true, unique: true },
    normalizedText: { type: String, required: true },
    verdict: { type: String, required: true },
    severity: { type: String, required: true },
    resultJson: { type: String, required: true },
    expiresAt: { type: Date, required: true },
  },
  { timestamps: true }
);

// MongoDB removes a document once its expiresAt has passed
factCheckSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export const FactCheckModel = mongoose.model<FactCheckDocument>('FactCheck', factCheckSchema);

/** Durable backing for the result cache. */
export interface ResultStore {
  load(key: string): Promise<CacheEntry | null>;
  save(entry: CacheEntry): Promise<void>;
}

export function parseStoredResult(json: string): FactCheckResult | null {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return null;
  }
  const parsed = factCheckResultSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export class MongoResultStore implements ResultStore {
  constructor(private readonly model: mongoose.Model<FactCheckDocument> = FactCheckModel) {}

  async load(key: string): Promise<CacheEntry | null> {
    const doc = await this.model.findOne({ key }).lean();
    if (!doc) {
      return null;
    }
    const result = parseStoredResult(doc.resultJson);
    if (!result) {
      logWarn('Cache', `Discarding unreadable stored result ${key.slice(0, 12)}`);
      return null;
    }
    return { key: doc.key, normalizedText: doc.normalizedText, result, expiresAt: doc.expiresAt.getTime() };
  }

  async save(entry: CacheEntry): Promise<void> {
    await this.model.replaceOne(
      { key: entry.key },
      {
        key: entry.key,
        normalizedText: entry.normalizedText,
        verdict: entry.result.verdict,
        severity: entry.result.severity,
        resultJson: JSON.stringify(entry.result),
        expiresAt: new Date(entry.expiresAt),
      },
      { upsert: true }
    );
  }
}
