import { extname } from "node:path";

// Formats the Gemini Files API accepts for audio understanding.
const AUDIO_MIME_TYPES: Record<string, string> = {
  ".aac": "audio/aac",
  ".aif": "audio/aiff",
  ".aiff": "audio/aiff",
  ".flac": "audio/flac",
  ".m4a": "audio/mp4",
  ".mp3": "audio/mp3",
  ".mpga": "audio/mpeg",
  ".oga": "audio/ogg",
  ".ogg": "audio/ogg",
  ".opus": "audio/ogg",
  ".wav": "audio/wav",
  ".webm": "audio/webm",
};

export function audioMimeType(filePath: string): string | undefined {
  return AUDIO_MIME_TYPES[extname(filePath).toLowerCase()];
}
