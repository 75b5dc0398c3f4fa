/**
 * Producer stamps recorded in cache manifests. Anything that changes the
 * bytes a provider would return for the same input digest belongs here;
 * bump a version when the pipeline's own output format changes.
 */
import type { ActorProfile, ElevenLabsVoice } from '../actors.js';
import type { ProducerStamp } from '../cache/scene-cache.js';

const AUDIO_VERSION = 1;
const VIDEO_VERSION = 1;
const COMPOSITION_VERSION = 1;

export const audioStamp = (voice: ElevenLabsVoice): ProducerStamp => ({
  producer: `elevenlabs/${voice.modelId}/${voice.voiceId}`,
  version:  AUDIO_VERSION,
});

export function videoStamp(profile: ActorProfile, dimension: { width: number; height: number }): ProducerStamp {
  const { video, audio } = profile;
  const voice = audio.provider === 'heygen'
    ? `voice=${audio.voiceId}`
    : `audio=${audioStamp(audio).producer}`;
  return {
    producer: `${video.provider}/${video.avatarId}/${video.avatarStyle}/${video.speed}/${dimension.width}x${dimension.height}/${voice}`,
    version:  VIDEO_VERSION,
  };
}

export const SCENE_AUDIO_STAMP: ProducerStamp = { producer: 'ffmpeg/concat-audio', version: COMPOSITION_VERSION };
export const SCENE_FINAL_STAMP: ProducerStamp = { producer: 'ffmpeg/scene', version: COMPOSITION_VERSION };
