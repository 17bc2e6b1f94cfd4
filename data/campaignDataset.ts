import fs from "node:fs";
import { logger } from "../config/logger.js";
import {
  ALL_CAMPAIGNS_SCOPE,
  normalizeScope,
  type CreativeSampleItem,
  type CreativeSampleSource,
  type SeriesOutcome,
  type TimeSeriesProvider,
} from "../orchestration/types.js";
import { fail, succeed, type Outcome } from "../shared/outcome.js";

export type CampaignRow = Readonly<Record<string, string>>;

export interface CampaignSpend {
  readonly campaign_name: string;
  readonly spend: number;
}

export interface DatasetSummary {
  readonly n_rows: number;
  readonly date_min: string | null;
  readonly date_max: string | null;
  readonly campaign_count: number;
  readonly top_campaigns_by_spend: readonly CampaignSpend[];
}

const REQUIRED_COLUMNS = ["date", "campaign_name"] as const;
const CREATIVE_COLUMNS = ["campaign_name", "adset_name", "creative_type", "creative_message", "ctr"] as const;
const TOP_CAMPAIGNS = 5;
const ISO_DAY = /^\d{4}-\d{2}-\d{2}/;

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetError";
  }
}

/** RFC 4180 reader: quoted fields, doubled quotes, CRLF or LF line endings. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  for (let i = 0; i < source.length; i++) {
    const char = source[i];

    if (inQuotes) {
      if (char === '"') {
        if (source[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && source[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new DatasetError("Unterminated quoted field in CSV input");
  }
  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter((r) => !(r.length === 1 && r[0] === ""));
}

function parseNumber(cell: string | undefined): number | null {
  if (cell === undefined) return null;
  const trimmed = cell.trim();
  if (trimmed.length === 0) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

function toDay(cell: string | undefined): string | null {
  if (cell === undefined) return null;
  const trimmed = cell.trim();
  if (ISO_DAY.test(trimmed)) return trimmed.slice(0, 10);
  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : new Date(parsed).toISOString().slice(0, 10);
}

/**
 * In-memory ad-campaign table. Serves daily metric series and creative samples
 * to the analysis pipeline.
 */
export class CampaignDataset implements TimeSeriesProvider, CreativeSampleSource {
  private readonly columnSet: ReadonlySet<string>;

  constructor(
    readonly columns: readonly string[],
    readonly rows: readonly CampaignRow[],
  ) {
    this.columnSet = new Set(columns);
    const missing = REQUIRED_COLUMNS.filter((c) => !this.columnSet.has(c));
    if (missing.length > 0) {
      throw new DatasetError(`Dataset missing required column(s): ${missing.join(", ")}`);
    }
  }

  static fromCsv(text: string): CampaignDataset {
    const [header, ...records] = parseCsv(text);
    if (!header) {
      throw new DatasetError("Dataset is empty");
    }

    const columns = header.map((h) => h.trim());
    const rows = records.map((record) => {
      const row: Record<string, string> = {};
      columns.forEach((column, index) => {
        row[column] = record[index] ?? "";
      });
      return row;
    });

    return new CampaignDataset(columns, rows);
  }

  hasColumn(column: string): boolean {
    return this.columnSet.has(column);
  }

  getSeries(scope: string, metric: string): Promise<SeriesOutcome> {
    return Promise.resolve(this.buildSeries(scope, metric));
  }

  private buildSeries(scope: string, metric: string): SeriesOutcome {
    const normalized = normalizeScope(scope);
    const rows =
      normalized === ALL_CAMPAIGNS_SCOPE
        ? this.rows
        : this.rows.filter((row) => row["campaign_name"] === normalized);

    if (rows.length === 0) {
      logger.debug({ scope }, "No rows for scope");
      return { ok: false, reason: "empty" };
    }
    if (!this.columnSet.has(metric)) {
      logger.warn({ metric }, "Metric column missing from dataset");
      return { ok: false, reason: "metric_not_found" };
    }

    const byDay = new Map<string, { sum: number; count: number }>();
    for (const row of rows) {
      const day = toDay(row["date"]);
      const value = parseNumber(row[metric]);
      if (day === null || value === null) continue;

      const bucket = byDay.get(day) ?? { sum: 0, count: 0 };
      bucket.sum += value;
      bucket.count += 1;
      byDay.set(day, bucket);
    }

    const values = [...byDay.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, bucket]) => bucket.sum / bucket.count);

    return { ok: true, values };
  }

  summary(): DatasetSummary {
    const days = this.rows
      .map((row) => toDay(row["date"]))
      .filter((day): day is string => day !== null)
      .sort();

    const spendByCampaign = new Map<string, number>();
    for (const row of this.rows) {
      const campaign = row["campaign_name"] ?? "";
      const spend = parseNumber(row["spend"]) ?? 0;
      spendByCampaign.set(campaign, (spendByCampaign.get(campaign) ?? 0) + spend);
    }

    const topCampaigns = this.columnSet.has("spend")
      ? [...spendByCampaign.entries()]
          .map(([campaign_name, spend]) => ({ campaign_name, spend }))
          .sort((a, b) => b.spend - a.spend)
          .slice(0, TOP_CAMPAIGNS)
      : [];

    return {
      n_rows: this.rows.length,
      date_min: days[0] ?? null,
      date_max: days[days.length - 1] ?? null,
      campaign_count: spendByCampaign.size,
      top_campaigns_by_spend: topCampaigns,
    };
  }

  getCreativeSample(n: number): Promise<Outcome<readonly CreativeSampleItem[]>> {
    const missing = CREATIVE_COLUMNS.filter((c) => !this.columnSet.has(c));
    if (missing.length > 0) {
      return Promise.resolve(fail(`missing creative column(s): ${missing.join(", ")}`));
    }

    const seenMessages = new Set<string>();
    const sample: CreativeSampleItem[] = [];

    for (const row of this.rows) {
      if (sample.length >= n) break;

      const item = toCreativeItem(row);
      if (item === null || seenMessages.has(item.creative_message)) continue;

      seenMessages.add(item.creative_message);
      sample.push(item);
    }

    return Promise.resolve(succeed(sample));
  }
}

function toCreativeItem(row: CampaignRow): CreativeSampleItem | null {
  const text = (column: string): string | null => {
    const value = row[column]?.trim() ?? "";
    return value.length > 0 ? value : null;
  };

  const campaignName = text("campaign_name");
  const adsetName = text("adset_name");
  const creativeType = text("creative_type");
  const message = text("creative_message");
  const ctr = parseNumber(row["ctr"]);

  if (campaignName === null || adsetName === null || creativeType === null || message === null || ctr === null) {
    return null;
  }

  return {
    campaign_name: campaignName,
    adset_name: adsetName,
    creative_type: creativeType,
    creative_message: message,
    ctr,
  };
}

export function loadCampaignDataset(datasetPath: string): CampaignDataset {
  if (!fs.existsSync(datasetPath)) {
    throw new DatasetError(`Dataset not found at ${datasetPath}`);
  }

  const dataset = CampaignDataset.fromCsv(fs.readFileSync(datasetPath, "utf-8"));
  logger.info(
    { datasetPath, rows: dataset.rows.length, columns: dataset.columns.length },
    "Campaign dataset loaded",
  );
  return dataset;
}
