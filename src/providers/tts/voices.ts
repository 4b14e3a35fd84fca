import { InvalidRequestError } from '../../errors';

export interface VoiceCatalog {
  // alias -> provider voice id; when non-empty only these are accepted
  voices: Readonly<Record<string, string>>;
  defaultVoice?: string;
  // fallback check for raw ids when no allowlist is configured
  isValidVoiceId: (voiceId: string) => boolean;
}

/**
 * Maps a voice selector (alias or raw id) to the provider voice id.
 * Throws InvalidRequestError for a missing or unsupported selector.
 */
export function resolveVoice(selector: string | undefined, catalog: VoiceCatalog): string {
  const requested = selector?.trim() || catalog.defaultVoice;
  if (!requested) {
    throw new InvalidRequestError('voice is required (no default voice configured)');
  }

  const aliases = Object.keys(catalog.voices);
  if (aliases.length > 0) {
    if (Object.prototype.hasOwnProperty.call(catalog.voices, requested)) {
      return catalog.voices[requested];
    }
    if (Object.values(catalog.voices).includes(requested)) {
      return requested;
    }
    throw new InvalidRequestError(`Unsupported voice: ${requested}. Valid: ${aliases.join(', ')}`);
  }

  if (!catalog.isValidVoiceId(requested)) {
    throw new InvalidRequestError(`Unsupported voice: ${requested}`);
  }
  return requested;
}
