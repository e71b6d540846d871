/**
 * Speech Module
 */

export { SystemSpeaker, speechCommand } from './speaker.js';
export type { Speaker, SpeechProcess, SpawnSpeech, SystemSpeakerOptions } from './speaker.js';
