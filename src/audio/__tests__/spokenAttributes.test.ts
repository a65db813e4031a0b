import { parseSpokenAttributes, parseSpokenPrice, spokenConfidence } from '../spokenAttributes';
import { encodeWav, pcmDurationMs } from '../wav';

describe('parseSpokenPrice', () => {
  test('should skip year-like numbers', () => {
    expect(parseSpokenPrice('this 2019 card is at 45 dollars')).toBe(45);
  });

  test('should return null when only years are spoken', () => {
    expect(parseSpokenPrice('a 2018 rookie')).toBeNull();
  });

  test('should read cents', () => {
    expect(parseSpokenPrice('bid is $12.50 now')).toBe(12.5);
  });
});

describe('parseSpokenAttributes', () => {
  test('should pick up set, year and rookie mentions', () => {
    const attributes = parseSpokenAttributes('Panini Prizm 2018 rookie');
    expect(attributes).toEqual({
      grade: null,
      gradingCompany: null,
      year: '2018',
      set: 'Panini',
      rookie: true,
      spokenPrice: null,
    });
    expect(spokenConfidence(attributes)).toBe(0.4);
  });

  test('should treat a grade number as the first spoken price', () => {
    const attributes = parseSpokenAttributes('PSA 9 Topps 2020');
    expect(attributes).toMatchObject({ grade: 'PSA 9', year: '2020', set: 'Topps', spokenPrice: 9 });
    expect(spokenConfidence(attributes)).toBe(1);
  });

  test('should score an empty transcript as zero', () => {
    expect(spokenConfidence(parseSpokenAttributes(''))).toBe(0);
  });
});

describe('encodeWav', () => {
  test('should prefix a 44-byte header describing the PCM', () => {
    const wav = encodeWav(Buffer.alloc(32000), 16000, 1);

    expect(wav.length).toBe(44 + 32000);
    expect(wav.subarray(0, 4).toString('ascii')).toBe('RIFF');
    expect(wav.subarray(8, 12).toString('ascii')).toBe('WAVE');
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(40)).toBe(32000);
  });

  test('should derive the duration of 16-bit PCM', () => {
    expect(pcmDurationMs(32000, 16000, 1)).toBe(1000);
  });
});
