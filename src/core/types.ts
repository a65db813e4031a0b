/**
 * Domain value types shared across the analysis pipeline.
 */

export interface TextFragment {
  text: string;
  /** 0..1 */
  confidence: number;
}

/** Best-effort parse of a card's printed or spoken description. Absent fields are null. */
export interface ItemAttributes {
  name: string | null;
  year: string | null;
  set: string | null;
  itemNumber: string | null;
  grade: string | null;
  gradingCompany: string | null;
  rookie: boolean;
}

export interface RecognizedText {
  fragments: TextFragment[];
  text: string;
  /** Text from the price/timer region only; equals `text` when the frame was read as one region. */
  priceText: string;
  attributes: ItemAttributes;
  /** Mean fragment confidence, 0 when nothing was read. */
  confidence: number;
  engine: string;
}

export interface SpokenAttributes {
  grade: string | null;
  gradingCompany: string | null;
  year: string | null;
  set: string | null;
  rookie: boolean;
  spokenPrice: number | null;
}

export interface TranscriptSnapshot {
  transcript: string;
  attributes: SpokenAttributes;
  confidence: number;
  active: boolean;
  /** Epoch ms of the chunk that produced this snapshot, null before the first one. */
  updatedAt: number | null;
}

export type Channel = 'text' | 'audio';

export type FusibleField = 'grade' | 'year' | 'set' | 'rookie';

export interface Identity extends ItemAttributes {
  provenance: Partial<Record<keyof ItemAttributes, Channel>>;
  /** Combined confidence, always within 0..1. */
  confidence: number;
  audioConfidence: number;
}

export interface AuctionInfo {
  /** 0 when no bid could be read. */
  currentBid: number;
  timeRemaining: string | null;
  bidCount: number | null;
}

export interface SoldListing {
  price: number;
  title: string;
  soldAt?: string;
}

export type SnapshotSource = 'live' | 'cache' | 'unavailable' | 'error';

export interface PriceSnapshot {
  count: number;
  /** Up to ten retained prices, ascending. */
  prices: number[];
  mean: number;
  median: number;
  min: number;
  max: number;
  /** Population standard deviation. */
  stdDev: number;
  query: string;
  cachedAt: string;
  /** False when the similarity filter was bypassed because it would have discarded everything. */
  filtered: boolean;
  broadened: boolean;
  source: SnapshotSource;
}

export type Recommendation = 'STRONG_BUY' | 'BUY' | 'WEAK_BUY' | 'WATCH' | 'PASS' | 'INSUFFICIENT_DATA';

export type TrafficLight = 'GREEN' | 'YELLOW' | 'RED' | 'GRAY';

export interface SignalResult {
  recommendation: Recommendation;
  signal: TrafficLight;
  confidence: number;
  reason: string | null;
  fairValue: number | null;
  fairValueRange: { low: number; high: number } | null;
  roiPercent: number | null;
  suggestedMaxBid: number | null;
  gradeMultiplier: number | null;
  keyFactors: string[];
}

export interface Advisory {
  recommendation: string;
  /** high / medium / low as reported by the model. */
  confidence: string | null;
  fairValueRange: { min: number; max: number } | null;
  dealQuality: string | null;
  maxBidSuggestion: number | null;
  reasoning: string;
  riskFactors: string[];
  upsidePotential: string | null;
  /** 'json' when the reply parsed, 'text' when only prose came back. */
  format: 'json' | 'text';
}

export interface AudioStatus {
  available: boolean;
  active: boolean;
  transcript: string;
  confidence: number;
  ageMs: number | null;
}

export interface Frame {
  /** Monotonic per source. */
  index: number;
  image: Buffer;
  mimeType: string;
  capturedAt: number;
}

export interface AudioChunk {
  pcm: Buffer;
  sampleRate: number;
  channels: number;
  startedAt: number;
  durationMs: number;
}

export interface AnalysisBundle {
  sessionId: string;
  frameIndex: number;
  identity: Identity;
  auctionInfo: AuctionInfo;
  priceSnapshot: PriceSnapshot;
  signalResult: SignalResult;
  advisoryText?: string;
  advisory?: Advisory;
  audioStatus: AudioStatus;
  detectionConfidence: number;
  engine: string;
  processingMs: number;
  timestamp: string;
}

export function emptyAttributes(): ItemAttributes {
  return {
    name: null,
    year: null,
    set: null,
    itemNumber: null,
    grade: null,
    gradingCompany: null,
    rookie: false,
  };
}

export function emptySpokenAttributes(): SpokenAttributes {
  return {
    grade: null,
    gradingCompany: null,
    year: null,
    set: null,
    rookie: false,
    spokenPrice: null,
  };
}

export function isResolved(identity: ItemAttributes): boolean {
  return identity.name !== null && identity.name.trim() !== '';
}
