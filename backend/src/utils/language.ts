import type { APIGatewayProxyEvent } from 'aws-lambda';
import { matchLanguage, type Language } from '@passcheck/shared';

interface WeightedTag {
  tag: string;
  quality: number;
}

function parseQuality(params: string[]): number {
  for (const param of params) {
    const [key, value] = param.split('=').map((part) => part.trim());
    if (key === 'q' && value !== undefined) {
      const quality = Number(value);
      return Number.isFinite(quality) ? quality : 0;
    }
  }
  return 1;
}

// Picks the highest-weighted supported language from an Accept-Language value,
// e.g. "fr-FR,nl;q=0.8,en;q=0.5" -> 'nl'. Tags weighted q=0 are refused.
export function languageFromAcceptHeader(header: string | undefined): Language | undefined {
  if (!header) return undefined;

  const tags: WeightedTag[] = header
    .split(',')
    .map((entry) => {
      const [tag, ...params] = entry.split(';');
      return { tag: tag.trim(), quality: parseQuality(params) };
    })
    .filter((entry) => entry.tag !== '' && entry.quality > 0);

  // Array.prototype.sort is stable, so equal weights keep header order
  tags.sort((a, b) => b.quality - a.quality);

  for (const { tag } of tags) {
    const language = matchLanguage(tag);
    if (language) return language;
  }
  return undefined;
}

export function getHeader(event: APIGatewayProxyEvent, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(event.headers ?? {})) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}
