// packages/job-service/src/domain/tracklist.ts
//
// Tracklist parsing. Two accepted shapes:
// - a JSON document `{ artist, name, genre?, year?, tracks: [...] }`
// - plain text, one `[N. ]Artist - Title START[-END]` per line, optional
//   `Artist:` / `Name:` / `Genre:` / `Year:` header lines.

import { TracklistError } from '@setsplit/contracts';
import { z } from 'zod';

import type { Track, Tracklist } from './job-model.js';

export interface ParseTracklistOptions {
  maxTracks: number;
}

const OFFSET = String.raw`\d{1,2}(?::\d{2}){1,2}`;
const TRACK_LINE = new RegExp(
  String.raw`^(?:\d+[.)]\s+)?(.+?)\s+-\s+(.+?)\s+(${OFFSET})(?:\s*-\s*(${OFFSET}))?$`,
);
const HEADER_LINE = /^(artist|name|genre|year)\s*:\s*(.*)$/i;

const trackSchema = z
  .object({
    artist: z.string().trim().default(''),
    name: z.string().trim().default(''),
    start_time: z.string().trim().optional(),
    startTime: z.string().trim().optional(),
    end_time: z.string().trim().optional(),
    endTime: z.string().trim().optional(),
  })
  .transform((t) => ({
    artist: t.artist,
    name: t.name,
    startTime: t.start_time ?? t.startTime ?? '',
    endTime: t.end_time ?? t.endTime ?? '',
  }));

const tracklistSchema = z.object({
  artist: z.string().trim().default(''),
  name: z.string().trim().default(''),
  genre: z.string().trim().optional(),
  year: z.number().int().optional(),
  tracks: z.array(trackSchema).default([]),
});

type DraftTrack = Omit<Track, 'trackNumber'>;

export function parseTracklist(raw: string, options: ParseTracklistOptions): Tracklist {
  const text = raw.trim();
  if (!text) {
    throw new TracklistError('tracklist is empty');
  }

  const draft = text.startsWith('{') ? parseJson(text) : parseText(text);

  if (draft.tracks.length === 0) {
    throw new TracklistError('at least one track is required');
  }
  if (draft.tracks.length > options.maxTracks) {
    throw new TracklistError(`maximum ${options.maxTracks} tracks allowed`);
  }

  return {
    ...draft,
    tracks: draft.tracks.map((track, index) => ({ ...track, trackNumber: index + 1 })),
  };
}

function parseJson(text: string): Omit<Tracklist, 'tracks'> & { tracks: DraftTrack[] } {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new TracklistError(err instanceof Error ? err.message : String(err), { cause: err });
  }

  const parsed = tracklistSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new TracklistError(`${where}${issue?.message ?? 'malformed document'}`);
  }

  const { artist, name, genre, year, tracks } = parsed.data;
  if (!artist || !name) {
    throw new TracklistError('artist and name are required');
  }
  tracks.forEach((track, index) => {
    if (!track.name) {
      throw new TracklistError(`track ${index + 1} has no name`);
    }
  });

  return {
    artist,
    name,
    ...(genre ? { genre } : {}),
    ...(year !== undefined ? { year } : {}),
    tracks,
  };
}

function parseText(text: string): Omit<Tracklist, 'tracks'> & { tracks: DraftTrack[] } {
  const header: { artist: string; name: string; genre?: string; year?: number } = {
    artist: '',
    name: '',
  };
  const tracks: DraftTrack[] = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) return;

    const headerMatch = tracks.length === 0 ? HEADER_LINE.exec(line) : null;
    if (headerMatch) {
      const key = (headerMatch[1] ?? '').toLowerCase();
      const value = (headerMatch[2] ?? '').trim();
      if (key === 'year') {
        if (!/^\d+$/.test(value)) {
          throw new TracklistError(`line ${index + 1}: year must be an integer`);
        }
        header.year = Number(value);
      } else if (key === 'artist' || key === 'name' || key === 'genre') {
        header[key] = value;
      }
      return;
    }

    const match = TRACK_LINE.exec(line);
    if (!match) {
      throw new TracklistError(`line ${index + 1}: expected "Artist - Title START[-END]"`);
    }
    const [, artist = '', name = '', startTime = '', endTime = ''] = match;
    tracks.push({ artist: artist.trim(), name: name.trim(), startTime, endTime });
  });

  // A missing end runs until the next track starts; the last stays open.
  const filled = tracks.map((track, index) => {
    const following = tracks[index + 1];
    if (track.endTime || !following) return track;
    return { ...track, endTime: following.startTime };
  });

  return {
    artist: header.artist,
    name: header.name,
    ...(header.genre ? { genre: header.genre } : {}),
    ...(header.year !== undefined ? { year: header.year } : {}),
    tracks: filled,
  };
}
