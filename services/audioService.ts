// Gemini TTS returns raw 16-bit little-endian mono PCM at 24kHz.
export const TTS_SAMPLE_RATE = 24000;

/** Stitches PCM buffers back to back, in the order given. */
export function concatAudio(buffers: Uint8Array[]): Uint8Array {
  const totalLength = buffers.reduce((acc, chunk) => acc + chunk.length, 0);
  const stitched = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of buffers) {
    stitched.set(chunk, offset);
    offset += chunk.length;
  }
  return stitched;
}

export function encodeWav(pcmData: Uint8Array, sampleRate = TTS_SAMPLE_RATE): Uint8Array {
  const buffer = new ArrayBuffer(44 + pcmData.length);
  const view = new DataView(buffer);
  writeString(view, 0, 'RIFF');
  view.setUint32(4, 36 + pcmData.length, true);
  writeString(view, 8, 'WAVE');
  writeString(view, 12, 'fmt ');
  view.setUint32(16, 16, true);
  view.setUint16(20, 1, true); // PCM
  view.setUint16(22, 1, true); // mono
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * 2, true);
  view.setUint16(32, 2, true);
  view.setUint16(34, 16, true);
  writeString(view, 36, 'data');
  view.setUint32(40, pcmData.length, true);
  const wav = new Uint8Array(buffer);
  wav.set(pcmData, 44);
  return wav;
}

/** Playback length of a PCM buffer produced by the TTS model. */
export const pcmDurationSeconds = (pcm: Uint8Array, sampleRate = TTS_SAMPLE_RATE): number =>
  pcm.length / (sampleRate * 2);

function writeString(view: DataView, offset: number, value: string) {
  for (let i = 0; i < value.length; i++) view.setUint8(offset + i, value.charCodeAt(i));
}
