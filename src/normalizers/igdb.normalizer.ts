/**
 * IGDB Normalizer
 */
import { IGDB_IMAGE_BASE } from '../fetchers/igdb.fetcher.js';
import type { IgdbItem } from '../fetchers/types.js';
import { dedupService } from '../services/dedup.service.js';
import { cleanText, cleanTitle } from './text.js';
import type { Normalizer } from './types.js';

export const igdbNormalizer: Normalizer<IgdbItem> = {
    provider: 'igdb',

    normalize(item, targetDate) {
        const { game } = item;
        const title = cleanTitle(game.name);

        return {
            id: dedupService.generateReleaseId('game', title, targetDate),
            mediaType: 'game',
            source: 'igdb',

            title,
            releaseDate: targetDate,

            synopsis: cleanText(game.summary),
            genres: item.genreNames,
            runtimeMinutes: null,
            category: null,
            coverArtUrl: item.coverImageId ? `${IGDB_IMAGE_BASE}/${item.coverImageId}.jpg` : null,
            language: null,
            popularity: game.rating ?? null,

            externalIds: { igdb: String(game.id) },
            details: {
                // The window may have been widened by a day on either side
                providerDate: game.first_release_date
                    ? new Date(game.first_release_date * 1000).toISOString().slice(0, 10)
                    : null,
                platforms: item.platformNames,
                rating: game.rating ?? null,
                ratingCount: game.total_rating_count ?? null,
            },
        };
    },
};
