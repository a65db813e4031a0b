import { z } from 'zod';
import type { LanguageModelPort } from '../../core/llm/LanguageModelPort';
import type { Advisory, ItemAttributes, PriceSnapshot } from '../../core/types';
import { createLogger } from '../../utils/logger';
import { extractJson, stripCodeFences, type LmStudioClient } from './LmStudioClient';

const logger = createLogger('lmstudio-llm');

const AdvisorySchema = z.object({
  recommendation: z.string(),
  confidence: z.string().nullish(),
  fair_value_range: z.object({ min: z.number(), max: z.number() }).nullish(),
  deal_quality: z.string().nullish(),
  max_bid_suggestion: z.number().nullish(),
  reasoning: z.string().default(''),
  risk_factors: z.array(z.string()).default([]),
  upside_potential: z.union([z.string(), z.number()]).nullish(),
});

function describeItem(attributes: ItemAttributes): string {
  return [
    attributes.name,
    attributes.year,
    attributes.set,
    attributes.itemNumber ? `#${attributes.itemNumber}` : null,
    attributes.grade,
    attributes.rookie ? 'RC' : null,
  ]
    .filter((part): part is string => Boolean(part))
    .join(' ');
}

/** Cut at the last whole word that fits. */
export function truncateQuery(query: string, maxLength: number): string {
  const clean = query.replace(/\s+/g, ' ').trim();
  if (clean.length <= maxLength) return clean;
  const cut = clean.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  return (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trim();
}

export function parseAdvisory(content: string): Advisory {
  const parsed = AdvisorySchema.safeParse(extractJson(content));
  if (!parsed.success) {
    return {
      recommendation: 'UNKNOWN',
      confidence: null,
      fairValueRange: null,
      dealQuality: null,
      maxBidSuggestion: null,
      reasoning: stripCodeFences(content).slice(0, 1000),
      riskFactors: [],
      upsidePotential: null,
      format: 'text',
    };
  }

  const data = parsed.data;
  return {
    recommendation: data.recommendation.toUpperCase(),
    confidence: data.confidence ?? null,
    fairValueRange: data.fair_value_range ?? null,
    dealQuality: data.deal_quality ?? null,
    maxBidSuggestion: data.max_bid_suggestion ?? null,
    reasoning: data.reasoning,
    riskFactors: data.risk_factors,
    upsidePotential: data.upside_potential == null ? null : String(data.upside_potential),
    format: 'json',
  };
}

export class LmStudioLanguageModel implements LanguageModelPort {
  readonly name = 'lmstudio';

  constructor(
    private readonly client: LmStudioClient,
    private readonly model: string,
    private readonly timeoutMs: number
  ) {}

  async compactQuery(attributes: ItemAttributes, maxLength: number): Promise<string> {
    const content = await this.client.chat(
      this.model,
      [
        {
          role: 'system',
          content:
            `You write eBay sold-listing search queries for trading cards. ` +
            `Reply with the query only, at most ${maxLength} characters. ` +
            `Keep, in priority order: player name, year, set, grade. Drop filler words.`,
        },
        {
          role: 'user',
          content: JSON.stringify({
            name: attributes.name,
            year: attributes.year,
            set: attributes.set,
            grade: attributes.grade,
            itemNumber: attributes.itemNumber,
            rookie: attributes.rookie,
          }),
        },
      ],
      { temperature: 0, maxTokens: 40, timeoutMs: this.timeoutMs }
    );

    const query = truncateQuery(stripCodeFences(content).replace(/^["']|["']$/g, ''), maxLength);
    if (!query) {
      throw new Error('Empty query from language model');
    }
    return query;
  }

  async advise(attributes: ItemAttributes, currentBid: number, snapshot: PriceSnapshot): Promise<Advisory> {
    const prompt = `Evaluate if this current bid represents a good deal:

Card: ${describeItem(attributes) || 'Unknown'}
Grade: ${attributes.grade ?? 'Ungraded'}
Current Bid: $${currentBid}
Market Data: ${JSON.stringify({
      count: snapshot.count,
      prices: snapshot.prices,
      mean: snapshot.mean,
      median: snapshot.median,
      min: snapshot.min,
      max: snapshot.max,
    })}

Provide recommendation in JSON format:
{
  "recommendation": "BUY/PASS/WATCH",
  "confidence": "high/medium/low",
  "fair_value_range": {"min": 0, "max": 0},
  "deal_quality": "excellent/good/fair/poor",
  "max_bid_suggestion": 0,
  "reasoning": "short explanation",
  "risk_factors": ["potential risks"],
  "upside_potential": "percentage upside if applicable"
}`;

    const content = await this.client.chat(this.model, [{ role: 'user', content: prompt }], {
      temperature: 0.2,
      maxTokens: 500,
      timeoutMs: this.timeoutMs,
    });

    const advisory = parseAdvisory(content);
    logger.debug('Advisory generated', { recommendation: advisory.recommendation, format: advisory.format });
    return advisory;
  }

  healthCheck(): Promise<{ healthy: boolean; latency?: number; error?: string }> {
    return this.client.healthCheck();
  }
}
