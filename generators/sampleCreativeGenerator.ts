import crypto from "node:crypto";
import { silentDiagnostics, type DiagnosticsSink } from "../orchestration/diagnostics.js";
import type {
  CreativeGenerator,
  CreativeRecord,
  CreativeSampleItem,
} from "../orchestration/types.js";
import { fail, succeed, type Outcome } from "../shared/outcome.js";

const COMPONENT = "creative";
const DEFAULT_CTA = "Shop Now";
const CTA_BY_TYPE: Readonly<Record<string, string>> = {
  video: "Watch Now",
  carousel: "See More",
  ugc: "Learn More",
};
const SENTENCE_END = /(?<=[.!?])\s+/;

export type CreativeIdFactory = () => string;

export function randomCreativeId(): string {
  return `cr_${crypto.randomUUID().replace(/-/g, "").slice(0, 8)}`;
}

export function firstSentence(message: string): string {
  return message.trim().split(SENTENCE_END)[0] ?? "";
}

export function ctaFor(creativeType: string): string {
  return CTA_BY_TYPE[creativeType.trim().toLowerCase()] ?? DEFAULT_CTA;
}

/**
 * Builds replacement creatives for a campaign out of the best-performing
 * messages in the dataset, favouring messages proven on other campaigns.
 */
export class SampleCreativeGenerator implements CreativeGenerator {
  constructor(
    private readonly idFactory: CreativeIdFactory = randomCreativeId,
    private readonly diagnostics: DiagnosticsSink = silentDiagnostics,
  ) {}

  generateForCampaign(
    scope: string,
    sampleItems: readonly CreativeSampleItem[],
    n: number,
  ): Promise<Outcome<readonly CreativeRecord[]>> {
    if (sampleItems.length === 0) {
      return Promise.resolve(fail(`no creative sample to draw from for ${scope}`));
    }

    const ranked = [...sampleItems].sort((a, b) => {
      const ownA = a.campaign_name === scope ? 1 : 0;
      const ownB = b.campaign_name === scope ? 1 : 0;
      return ownA - ownB || b.ctr - a.ctr;
    });

    const seen = new Set<string>();
    const creatives: CreativeRecord[] = [];

    for (const item of ranked) {
      if (creatives.length >= n) break;

      const draft = draftCreative(scope, item);
      const key = [draft.headline, draft.body, draft.rationale]
        .map((part) => part.trim().toLowerCase())
        .join("\u0000");
      if (seen.has(key)) continue;

      seen.add(key);
      creatives.push({ campaign: scope, creative_id: this.idFactory(), ...draft });
    }

    this.diagnostics.debug(COMPONENT, "creative:drafted", "Creatives drafted from sample", {
      scope,
      requested: n,
      produced: creatives.length,
    });

    return Promise.resolve(succeed(creatives));
  }
}

function draftCreative(
  scope: string,
  item: CreativeSampleItem,
): Omit<CreativeRecord, "campaign" | "creative_id"> {
  const ctrPct = (item.ctr * 100).toFixed(2);
  return {
    creative_type: item.creative_type,
    headline: firstSentence(item.creative_message),
    body: item.creative_message,
    cta: ctaFor(item.creative_type),
    rationale: `Adapted for ${scope} from "${item.campaign_name}" / ${item.adset_name}, which reached ${ctrPct}% CTR`,
    inspiration_refs: [`${item.campaign_name}/${item.adset_name}`],
  };
}
