/**
 * Jikan Normalizer
 * Normalizes MyAnimeList schedule entries to anime ReleaseRecords
 */
import type { JikanItem } from '../fetchers/types.js';
import { dedupService } from '../services/dedup.service.js';
import { cleanText, cleanTitle, nonEmpty } from './text.js';
import type { Normalizer } from './types.js';

/**
 * Minutes per episode from strings like "24 min per ep" or "1 hr 5 min"
 */
export function parseDuration(duration: string | null | undefined): number | null {
    if (!duration) return null;

    const hours = /(\d+)\s*hr/.exec(duration);
    const minutes = /(\d+)\s*min/.exec(duration);
    if (!hours && !minutes) return null;

    const total = (hours ? Number(hours[1]) * 60 : 0) + (minutes ? Number(minutes[1]) : 0);
    return total > 0 ? total : null;
}

export const jikanNormalizer: Normalizer<JikanItem> = {
    provider: 'jikan',

    normalize(item, targetDate) {
        const { anime } = item;
        const title = cleanTitle(anime.title);
        const images = anime.images?.jpg;

        return {
            id: dedupService.generateReleaseId('anime', title, targetDate),
            mediaType: 'anime',
            source: 'jikan',

            title,
            releaseDate: targetDate,

            synopsis: cleanText(anime.synopsis),
            genres: nonEmpty([...anime.genres, ...anime.themes].map(genre => genre.name)),
            runtimeMinutes: parseDuration(anime.duration),
            category: cleanText(anime.type),
            coverArtUrl: cleanText(images?.large_image_url) ?? cleanText(images?.image_url),
            language: 'ja',
            popularity: anime.members ?? null,

            externalIds: { mal: String(anime.mal_id) },
            details: {
                // Schedules are weekly; the provider reports a weekday, not a date
                providerDate: item.weekday,
                titleEnglish: cleanText(anime.title_english),
                titleJapanese: cleanText(anime.title_japanese),
                episodes: anime.episodes ?? null,
                status: cleanText(anime.status),
                rating: cleanText(anime.rating),
                score: anime.score ?? null,
                studios: nonEmpty(anime.studios.map(studio => studio.name)),
                streaming: nonEmpty(anime.streaming.map(service => service.name)),
                url: cleanText(anime.url),
            },
        };
    },
};
