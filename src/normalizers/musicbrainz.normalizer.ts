/**
 * MusicBrainz Normalizer
 * Cover art is filled in later by the cover-art enricher
 */
import type { MusicBrainzItem } from '../fetchers/types.js';
import type { MusicBrainzRelease } from '../fetchers/schemas.js';
import { dedupService } from '../services/dedup.service.js';
import { cleanText, cleanTitle, nonEmpty } from './text.js';
import type { Normalizer } from './types.js';

const FORMAT_LABELS: Readonly<Record<string, string>> = {
    'CD': 'CD',
    'Enhanced CD': 'CD',
    'CD-R': 'CD',
    '12" Vinyl': 'Vinyl',
    '7" Vinyl': 'Vinyl',
    '10" Vinyl': 'Vinyl',
    'Vinyl': 'Vinyl',
    'Cassette': 'Cassette',
    'Digital Media': 'Digital',
};

/**
 * Sorted, unique format labels; unknown formats are ignored
 */
export function extractFormats(media: MusicBrainzRelease['media']): string[] {
    const formats = new Set<string>();
    for (const medium of media) {
        const label = medium.format ? FORMAT_LABELS[medium.format] : undefined;
        if (label) formats.add(label);
    }
    return [...formats].sort();
}

export const musicBrainzNormalizer: Normalizer<MusicBrainzItem> = {
    provider: 'musicbrainz',

    normalize(item, targetDate) {
        const { release } = item;
        const title = cleanTitle(release.title);
        const formats = extractFormats(release.media);
        const primaryType = cleanText(release['release-group']?.['primary-type']);
        const barcode = cleanText(release.barcode);

        const externalIds: Record<string, string> = { musicbrainz: release.id };
        if (barcode) externalIds['barcode'] = barcode;

        return {
            id: dedupService.generateReleaseId('music', title, targetDate),
            mediaType: 'music',
            source: 'musicbrainz',

            title,
            releaseDate: targetDate,

            synopsis: null,
            genres: primaryType ? [primaryType, ...formats] : formats,
            runtimeMinutes: null,
            category: primaryType,
            coverArtUrl: null,
            language: cleanText(release['text-representation']?.language),
            popularity: null,

            externalIds,
            details: {
                providerDate: cleanText(release.date),
                artists: nonEmpty(release['artist-credit'].map(credit => credit.name ?? credit.artist?.name)),
                formats,
                trackCount: release.media.reduce((sum, medium) => sum + (medium['track-count'] ?? 0), 0),
                labels: nonEmpty(release['label-info'].map(info => info.label?.name)),
                catalogNumbers: nonEmpty(release['label-info'].map(info => info['catalog-number'])),
                country: cleanText(release.country),
                barcode,
                mbid: release.id,
            },
        };
    },
};
