import { ValidationError } from '../sync.errors';
import {
  CanonicalRecord,
  DetailRecord,
  RawEpisode,
  RawMovie,
  RawServer,
  ValidMovie,
} from '../dto/canonical.dto';

export const SYNOPSIS_MAX_LENGTH = 1000;
export const TRUNCATION_MARKER = '...';

const MOVIE_TEXT_FIELDS = ['name', 'origin_name', 'content', 'trailer_url'] as const;
const EPISODE_TEXT_FIELDS = ['name', 'filename'] as const;

const QUOTE_FOLDS: Record<string, string> = {
  '\u201C': '"',
  '\u201D': '"',
  '\u2018': "'",
  '\u2019': "'",
};

// Control, format, surrogate, private-use and unassigned code points, line and
// paragraph separators, and every space separator except U+0020.
const NON_PRINTABLE = /[\p{C}\p{Zl}\p{Zp}\p{Zs}]/gu;

function isFilled(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isListOrAbsent(value: unknown): boolean {
  return value === undefined || Array.isArray(value);
}

export function validateMovie(movie: RawMovie | null | undefined): movie is ValidMovie {
  if (!movie) return false;
  return (
    isFilled(movie._id) &&
    isFilled(movie.name) &&
    isFilled(movie.slug) &&
    isFilled(movie.content) &&
    isListOrAbsent(movie.category) &&
    isListOrAbsent(movie.country) &&
    (isFilled(movie.poster_url) || isFilled(movie.thumb_url))
  );
}

// Circular structures and BigInt members make JSON.stringify throw.
function describeObject(value: object): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function isEntry(value: unknown): boolean {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function sanitizeText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value !== 'string') {
    if (typeof value === 'object') return sanitizeText(describeObject(value));
    return sanitizeText(String(value));
  }

  return value
    .normalize('NFC')
    .replace(/[\u201C\u201D\u2018\u2019]/g, (quote) => QUOTE_FOLDS[quote] ?? quote)
    .replace(NON_PRINTABLE, (char) => (char === ' ' ? char : ''))
    .normalize('NFC');
}

/** Cuts `text` to `max` code points, appending the marker only when something was cut. */
export function truncateText(text: string, max = SYNOPSIS_MAX_LENGTH, marker = TRUNCATION_MARKER): string {
  const codePoints = Array.from(text);
  if (codePoints.length <= max) return text;
  return codePoints.slice(0, max).join('') + marker;
}

function sanitizeEpisode(episode: RawEpisode): RawEpisode {
  const result: RawEpisode = { ...episode };
  for (const field of EPISODE_TEXT_FIELDS) {
    if (field in episode) result[field] = sanitizeText(episode[field]);
  }
  return result;
}

function sanitizeServer(server: RawServer): RawServer {
  if (!Array.isArray(server.server_data)) return { ...server };
  return { ...server, server_data: server.server_data.filter(isEntry).map(sanitizeEpisode) };
}

export function buildCanonical(detail: DetailRecord): CanonicalRecord {
  const movie = detail.movie;
  if (!validateMovie(movie)) {
    throw new ValidationError(`invalid movie payload slug=${movie?.slug ?? 'unknown'}`);
  }

  const sanitized: ValidMovie = { ...movie };
  for (const field of MOVIE_TEXT_FIELDS) {
    if (field in movie) sanitized[field] = sanitizeText(movie[field]);
  }
  sanitized.content = truncateText(sanitized.content);

  const episodes = Array.isArray(detail.episodes) ? detail.episodes : [];

  return {
    status: detail.status === true,
    msg: detail.msg ?? detail.message ?? '',
    movie: sanitized,
    episodes: episodes.filter(isEntry).map(sanitizeServer),
  };
}
