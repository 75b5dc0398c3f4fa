/**
 * Speech synthesis: ElevenLabs text-to-speech written to a local mp3.
 * Only pipeline/speech.ts calls this; everything else goes through the cache.
 */
import * as fs from 'fs';
import { ElevenLabsClient } from '@elevenlabs/elevenlabs-js';
import { logger } from '../utils/logger.js';
import type { ElevenLabsVoice } from '../actors.js';

export interface SpeechProvider {
  readonly name: string;
  /** Synthesize `text` and write the audio to `outputPath`. */
  synthesize(text: string, voice: ElevenLabsVoice, outputPath: string): Promise<void>;
}

export class ElevenLabsSpeech implements SpeechProvider {
  readonly name = 'elevenlabs';
  private readonly client: ElevenLabsClient;

  constructor(apiKey: string) {
    this.client = new ElevenLabsClient({ apiKey });
  }

  async synthesize(text: string, voice: ElevenLabsVoice, outputPath: string): Promise<void> {
    logger.info('Voice: synthesizing paragraph', { voiceId: voice.voiceId, modelId: voice.modelId, chars: text.length });
    const audio = await this.client.textToSpeech.convert(voice.voiceId, {
      text,
      modelId: voice.modelId,
    });
    const bytes = Buffer.from(await new Response(audio).arrayBuffer());
    if (bytes.length === 0) throw new Error('ElevenLabs returned an empty audio stream');
    fs.writeFileSync(outputPath, bytes);
    logger.debug('Voice: audio written', { outputPath, bytes: bytes.length });
  }
}
