import type { SpeechToTextPort } from '../../core/speech/SpeechToTextPort';
import type { AudioSource } from '../../core/source/SourcePorts';
import type { AudioChunk } from '../../core/types';
import { sleep } from '../../utils/sleep';
import { SpeechTranscriber } from '../SpeechTranscriber';

const OPTIONS = { queueCapacity: 2, staleAfterMs: 30_000, captureBackoffMs: 5 };

function chunk(startedAt: number): AudioChunk {
  return { pcm: Buffer.alloc(16), sampleRate: 16000, channels: 1, startedAt, durationMs: 7000 };
}

/** Hands out the given chunks, then waits until aborted. */
class FakeAudioSource implements AudioSource {
  readonly start = jest.fn(async () => undefined);
  readonly stop = jest.fn(async () => undefined);

  constructor(private readonly chunks: AudioChunk[]) {}

  async nextChunk(signal?: AbortSignal): Promise<AudioChunk | undefined> {
    const next = this.chunks.shift();
    if (next) return next;
    if (!signal || signal.aborted) return undefined;
    await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
    return undefined;
  }
}

function fakeStt(transcribe: SpeechToTextPort['transcribe'], initialize: () => Promise<void> = async () => undefined) {
  return { name: 'fake-stt', initialize: jest.fn(initialize), transcribe: jest.fn(transcribe) };
}

async function waitFor(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await sleep(5);
  }
}

describe('SpeechTranscriber', () => {
  test('should stay disabled when the speech model cannot start', async () => {
    const stt = fakeStt(
      async () => ({ text: '' }),
      async () => {
        throw new Error('no model');
      }
    );
    const source = new FakeAudioSource([chunk(1000)]);
    const transcriber = new SpeechTranscriber(stt, source, OPTIONS, () => 10_000);

    await transcriber.start();

    expect(transcriber.isAvailable).toBe(false);
    expect(transcriber.isRunning).toBe(false);
    expect(source.start).not.toHaveBeenCalled();
    expect(transcriber.fusionInput().confidence).toBe(0);
    expect(transcriber.getStatus()).toEqual({
      available: false,
      active: false,
      transcript: '',
      confidence: 0,
      ageMs: null,
    });
  });

  test('should stay disabled without an engine or source', async () => {
    const transcriber = new SpeechTranscriber(undefined, undefined, OPTIONS);
    await expect(transcriber.initialize()).resolves.toBe(false);
    await transcriber.start();
    expect(transcriber.isRunning).toBe(false);
  });

  test('should allow a restart after the audio source fails to start', async () => {
    const stt = fakeStt(async () => ({ text: 'PSA 10' }));
    const source = new FakeAudioSource([chunk(1000)]);
    source.start.mockRejectedValueOnce(new Error('no input device'));
    const transcriber = new SpeechTranscriber(stt, source, OPTIONS);

    await expect(transcriber.start()).rejects.toThrow('no input device');
    expect(transcriber.isRunning).toBe(false);

    await transcriber.start();
    expect(transcriber.isRunning).toBe(true);
    expect(source.start).toHaveBeenCalledTimes(2);

    await transcriber.stop();
  });

  test('should publish the transcript of each chunk', async () => {
    const stt = fakeStt(async () => ({ text: 'PSA 9 Topps 2020' }));
    const transcriber = new SpeechTranscriber(stt, new FakeAudioSource([chunk(1000)]), OPTIONS, () => 10_000);

    await transcriber.start();
    await waitFor(() => transcriber.getLatest().updatedAt !== null);

    expect(transcriber.getLatest()).toMatchObject({
      transcript: 'PSA 9 Topps 2020',
      confidence: 1,
      active: true,
      updatedAt: 8000,
    });
    expect(transcriber.fusionInput(10_000)).toEqual({
      attributes: {
        grade: 'PSA 9',
        gradingCompany: 'PSA',
        year: '2020',
        set: 'Topps',
        rookie: false,
        spokenPrice: 9,
      },
      confidence: 1,
    });
    expect(transcriber.getStatus(10_000).ageMs).toBe(2000);

    await transcriber.stop();
  });

  test('should give a stale snapshot zero weight', async () => {
    const stt = fakeStt(async () => ({ text: 'PSA 9 Topps 2020' }));
    const transcriber = new SpeechTranscriber(stt, new FakeAudioSource([chunk(1000)]), OPTIONS);

    await transcriber.start();
    await waitFor(() => transcriber.getLatest().updatedAt !== null);

    expect(transcriber.fusionInput(8000 + 30_000).confidence).toBe(1);
    expect(transcriber.fusionInput(8000 + 30_001).confidence).toBe(0);

    await transcriber.stop();
  });

  test('should count failed chunks and keep transcribing', async () => {
    let calls = 0;
    const stt = fakeStt(async () => {
      calls++;
      if (calls === 1) throw new Error('timeout');
      return { text: 'Bowman 2019' };
    });
    const transcriber = new SpeechTranscriber(stt, new FakeAudioSource([chunk(0), chunk(7000)]), OPTIONS);

    await transcriber.start();
    await waitFor(() => transcriber.getStats().chunksTranscribed === 1);

    expect(transcriber.getStats()).toMatchObject({ chunksTranscribed: 1, transcriptionErrors: 1 });
    expect(transcriber.getLatest().transcript).toBe('Bowman 2019');

    await transcriber.stop();
  });

  test('should contribute nothing once stopped', async () => {
    const stt = fakeStt(async () => ({ text: 'PSA 10' }));
    const source = new FakeAudioSource([chunk(1000)]);
    const transcriber = new SpeechTranscriber(stt, source, OPTIONS, () => 9000);

    await transcriber.start();
    await waitFor(() => transcriber.getLatest().updatedAt !== null);
    await transcriber.stop();

    expect(source.stop).toHaveBeenCalledTimes(1);
    expect(transcriber.isRunning).toBe(false);
    expect(transcriber.getStatus().active).toBe(false);
    expect(transcriber.fusionInput().confidence).toBe(0);
  });
});
