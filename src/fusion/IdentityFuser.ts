/**
 * Confidence-weighted merge of the on-screen and spoken channels into one identity.
 *
 * Pure and deterministic: the same inputs always produce the same identity.
 */

import type { Channel, FusibleField, Identity, ItemAttributes, SpokenAttributes } from '../core/types';

const ATTRIBUTE_KEYS: ReadonlyArray<keyof ItemAttributes> = [
  'name',
  'year',
  'set',
  'itemNumber',
  'grade',
  'gradingCompany',
  'rookie',
];

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function hasValue(value: string | boolean | null): boolean {
  return value !== null && value !== false && value !== '';
}

function textProvenance(text: ItemAttributes): Identity['provenance'] {
  const provenance: Identity['provenance'] = {};
  for (const key of ATTRIBUTE_KEYS) {
    if (hasValue(text[key])) {
      provenance[key] = 'text';
    }
  }
  return provenance;
}

export function audioWeight(textConfidence: number, audioConfidence: number): number {
  const t = clamp01(textConfidence);
  const a = clamp01(audioConfidence);
  return t + a === 0 ? 0 : a / (t + a);
}

export function fuse(
  text: ItemAttributes,
  audio: SpokenAttributes,
  textConfidence: number,
  audioConfidence: number
): Identity {
  const t = clamp01(textConfidence);
  const a = clamp01(audioConfidence);
  const identity: Identity = {
    ...text,
    provenance: textProvenance(text),
    confidence: t,
    audioConfidence: a,
  };

  if (t + a === 0 || a === 0) {
    return identity;
  }

  const weight = audioWeight(t, a);
  const take = (field: FusibleField): boolean => {
    if (!hasValue(audio[field])) return false;
    if (!hasValue(text[field])) return true;
    return weight > 0.5;
  };
  const mark = (field: keyof ItemAttributes, channel: Channel): void => {
    identity.provenance[field] = channel;
  };

  if (take('grade')) {
    identity.grade = audio.grade;
    identity.gradingCompany = audio.gradingCompany;
    mark('grade', 'audio');
    mark('gradingCompany', 'audio');
  }
  if (take('year')) {
    identity.year = audio.year;
    mark('year', 'audio');
  }
  if (take('set')) {
    identity.set = audio.set;
    mark('set', 'audio');
  }
  if (take('rookie')) {
    identity.rookie = audio.rookie;
    mark('rookie', 'audio');
  }

  identity.confidence = clamp01(t * (1 - weight) + a * weight);
  return identity;
}
