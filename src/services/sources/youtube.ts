import { z } from 'zod';
import { logger } from '../../utils/logger';
import { SourceUnavailableError } from '../pipeline/errors';
import type { DocumentSource } from './source.interface';

const VIDEO_ID_PATTERNS: RegExp[] = [
  /(?:youtube\.com\/watch\?v=|youtu\.be\/|youtube\.com\/embed\/|youtube\.com\/shorts\/)([a-zA-Z0-9_-]{11})/,
  /youtube\.com\/watch\?(?:.*&)?v=([a-zA-Z0-9_-]{11})/,
];

const BARE_VIDEO_ID = /^[a-zA-Z0-9_-]{11}$/;

export function extractVideoId(ref: string): string | null {
  const trimmed = ref.trim();
  if (BARE_VIDEO_ID.test(trimmed)) return trimmed;

  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = trimmed.match(pattern);
    if (match) return match[1];
  }
  return null;
}

const captionTracksSchema = z.object({
  playerCaptionsTracklistRenderer: z.object({
    captionTracks: z
      .array(z.object({ baseUrl: z.string(), languageCode: z.string() }))
      .default([]),
  }),
});

export type CaptionTrack = z.infer<typeof captionTracksSchema>['playerCaptionsTracklistRenderer']['captionTracks'][number];

/**
 * Caption tracks embedded in a watch page, or an empty list when the video
 * has no captions.
 */
export function parseCaptionTracks(html: string): CaptionTrack[] {
  const parts = html.split('"captions":');
  if (parts.length < 2) return [];

  const json = parts[1].split(',"videoDetails')[0].replace(/\n/g, '');
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    logger.debug({ error }, 'Caption metadata is not valid JSON');
    return [];
  }

  const parsed = captionTracksSchema.safeParse(data);
  return parsed.success ? parsed.data.playerCaptionsTracklistRenderer.captionTracks : [];
}

export function pickCaptionTrack(tracks: CaptionTrack[], language: string): CaptionTrack | null {
  return (
    tracks.find((track) => track.languageCode === language) ??
    tracks.find((track) => track.languageCode === 'en') ??
    tracks[0] ??
    null
  );
}

const ENTITIES: Record<string, string> = {
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&lt;': '<',
  '&gt;': '>',
};

function decodeEntities(text: string): string {
  return text
    .replace(/&amp;/g, '&')
    .replace(/&(?:quot|#39|apos|lt|gt);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/&#(\d+);/g, (entity, code: string) => fromCodePoint(entity, Number.parseInt(code, 10)))
    .replace(/&#x([0-9a-f]+);/gi, (entity, code: string) => fromCodePoint(entity, Number.parseInt(code, 16)));
}

function fromCodePoint(entity: string, codePoint: number): string {
  return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
}

/**
 * Flatten timed-text XML into a single line of text.
 */
export function parseTimedText(xml: string): string {
  const segments: string[] = [];
  for (const match of xml.matchAll(/<text[^>]*>([\s\S]*?)<\/text>/g)) {
    const text = decodeEntities(match[1]).replace(/<[^>]+>/g, '').replace(/\s+/g, ' ').trim();
    if (text) segments.push(text);
  }
  return segments.join(' ');
}

export interface YouTubeSourceOptions {
  language: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class YouTubeTranscriptSource implements DocumentSource {
  readonly name = 'youtube';
  private fetchImpl: typeof fetch;

  constructor(private readonly options: YouTubeSourceOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  resolveDocumentId(ref: string): string | null {
    return extractVideoId(ref);
  }

  async fetchDocument(videoId: string): Promise<string | null> {
    const html = await this.getText(`https://www.youtube.com/watch?v=${videoId}`, videoId);
    const track = pickCaptionTrack(parseCaptionTracks(html), this.options.language);
    if (!track) {
      logger.info({ videoId }, 'No caption tracks available');
      return null;
    }

    const xml = await this.getText(track.baseUrl, videoId);
    const transcript = parseTimedText(xml);
    logger.debug(
      { videoId, languageCode: track.languageCode, characters: transcript.length },
      'Fetched transcript',
    );
    return transcript || null;
  }

  private async getText(url: string, videoId: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { 'Accept-Language': this.options.language },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new SourceUnavailableError(videoId, { cause: error });
    }
    if (!response.ok) {
      throw new SourceUnavailableError(videoId, {
        cause: new Error(`HTTP ${response.status} from ${new URL(url).hostname}`),
      });
    }
    return response.text();
  }
}
