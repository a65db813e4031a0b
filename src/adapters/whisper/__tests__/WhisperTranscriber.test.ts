import axios, { type InternalAxiosRequestConfig } from 'axios';
import type { AudioChunk } from '../../../core/types';
import { ExternalServiceError, ServiceUnavailableError } from '../../../utils/errors';
import { WhisperTranscriber } from '../WhisperTranscriber';

const CONFIG = {
  baseUrl: 'http://stt.test',
  apiKey: 'test-secret',
  model: 'whisper-1',
  language: 'en',
  timeoutMs: 5000,
};

const CHUNK: AudioChunk = { pcm: Buffer.alloc(320), sampleRate: 16000, channels: 1, startedAt: 0, durationMs: 10 };

describe('WhisperTranscriber', () => {
  let requests: InternalAxiosRequestConfig[];
  let reply: () => Promise<unknown>;

  beforeEach(() => {
    requests = [];
    const instance = axios.create({
      adapter: async (config) => {
        requests.push(config);
        return { data: await reply(), status: 200, statusText: 'OK', headers: {}, config };
      },
    });
    jest.spyOn(axios, 'create').mockReturnValue(instance);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should be unavailable without an endpoint', async () => {
    const transcriber = new WhisperTranscriber({ ...CONFIG, baseUrl: undefined });

    await expect(transcriber.initialize()).rejects.toThrow(ServiceUnavailableError);
    expect(axios.create).not.toHaveBeenCalled();
  });

  test('should check the models endpoint on initialize', async () => {
    reply = async () => ({ data: [] });
    await new WhisperTranscriber(CONFIG).initialize();

    expect(requests[0].url).toBe('/v1/models');
    expect(axios.create).toHaveBeenCalledWith(
      expect.objectContaining({ baseURL: 'http://stt.test', headers: { Authorization: 'Bearer test-secret' } })
    );
  });

  test('should report an unreachable endpoint as unavailable', async () => {
    reply = async () => {
      throw new Error('connect ECONNREFUSED');
    };
    await expect(new WhisperTranscriber(CONFIG).initialize()).rejects.toThrow(
      'transcription unavailable: connect ECONNREFUSED'
    );
  });

  test('should post the chunk and return the trimmed transcript', async () => {
    reply = async () => ({ text: '  PSA 10 Mike Trout  ', language: 'en' });

    const result = await new WhisperTranscriber(CONFIG).transcribe(CHUNK);

    expect(result).toEqual({ text: 'PSA 10 Mike Trout', language: 'en' });
    expect(requests[0].method).toBe('post');
    expect(requests[0].url).toBe('/v1/audio/transcriptions');
  });

  test('should wrap an unexpected response', async () => {
    reply = async () => ({ segments: [] });
    await expect(new WhisperTranscriber(CONFIG).transcribe(CHUNK)).rejects.toThrow(ExternalServiceError);
  });

  test('should keep the transport error in the message', async () => {
    reply = async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:9000');
    };
    await expect(new WhisperTranscriber(CONFIG).transcribe(CHUNK)).rejects.toThrow(
      'External service transcription is unavailable: connect ECONNREFUSED 127.0.0.1:9000'
    );
  });
});
