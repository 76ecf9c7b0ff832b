/**
 * Cover Art Archive Enricher
 * Front cover for MusicBrainz releases
 */
import { ProviderRequestError } from '../fetchers/errors.js';
import { coverArtSchema, type CoverArtListing } from '../fetchers/schemas.js';
import type { ReleaseRecord } from '../normalizers/types.js';
import { LookupBudget } from '../services/budget.js';
import type { EnrichContext, Enricher, RecordPatch } from './types.js';

export const COVER_ART_ARCHIVE_BASE = 'https://coverartarchive.org/release';

/**
 * Front image preferred; 500px thumbnail preferred over the full-size original
 */
export function pickCoverUrl(listing: CoverArtListing): string | null {
    const image = listing.images.find(candidate => candidate.front) ?? listing.images[0];
    if (!image) return null;

    const { thumbnails } = image;
    return thumbnails['500'] ?? thumbnails['large'] ?? thumbnails['small'] ?? image.image ?? null;
}

class CoverArtEnricher implements Enricher {
    readonly name = 'music_cover_art';
    readonly budget: LookupBudget;

    constructor(limit: number) {
        this.budget = new LookupBudget(this.name, limit);
    }

    eligible(record: ReleaseRecord): boolean {
        return record.mediaType === 'music'
            && record.coverArtUrl === null
            && record.externalIds['musicbrainz'] !== undefined;
    }

    async lookup(record: ReleaseRecord, ctx: EnrichContext): Promise<RecordPatch | null> {
        const mbid = record.externalIds['musicbrainz'];
        if (!mbid) return null;

        try {
            const listing = await ctx.client('coverartarchive')
                .fetchParsed(`${COVER_ART_ARCHIVE_BASE}/${mbid}`, coverArtSchema, 'cover art listing');
            const url = pickCoverUrl(listing);
            return url ? { coverArtUrl: url } : null;
        } catch (error) {
            // 404: the release has no artwork
            if (error instanceof ProviderRequestError && error.status === 404) return null;
            throw error;
        }
    }
}

export function createCoverArtEnricher(limit: number): Enricher {
    return new CoverArtEnricher(limit);
}
