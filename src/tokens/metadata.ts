import { RoundError } from '../errors';
import { Round } from '../round/types';
import { TokenIdScheme } from './scheme';

export type MetadataSources = {
    lossImage: string;
    winImage: string;
    pendingImage: string;
    externalUrl?: string;
};

export const DEFAULT_METADATA_SOURCES: MetadataSources = {
    lossImage: 'ipfs://trivia-rounds/loss.png',
    winImage: 'ipfs://trivia-rounds/win.png',
    pendingImage: 'ipfs://trivia-rounds/pending.png',
};

export type TokenMetadata = {
    name: string;
    description: string;
    image: string;
    external_url?: string;
    attributes: { trait_type: string; value: string | number }[];
};

export type RoundLookup = {
    currentRound: number;
    getRound(roundId: number): Round | undefined;
};

function withExternalUrl(metadata: TokenMetadata, sources: MetadataSources): TokenMetadata {
    return sources.externalUrl ? { ...metadata, external_url: sources.externalUrl } : metadata;
}

function lossDescriptor(sources: MetadataSources, roundId?: number): TokenMetadata {
    const attributes: TokenMetadata['attributes'] = [{ trait_type: 'Outcome', value: 'Loss' }];
    if (roundId !== undefined) attributes.push({ trait_type: 'Round', value: roundId });
    return withExternalUrl(
        {
            name: roundId !== undefined ? `Trivia Round #${roundId}: Participant` : 'Trivia Participant',
            description: 'Awarded for taking part in a trivia round without winning it.',
            image: sources.lossImage,
            attributes,
        },
        sources,
    );
}

/**
 * Renders the descriptor for an outcome token.
 * Throws TokenNotFound for ids the scheme never issues or that point past
 * the latest round or at a cancelled round's win id.
 */
export function renderMetadata(
    tokenId: number,
    scheme: TokenIdScheme,
    rounds: RoundLookup,
    sources: MetadataSources,
): TokenMetadata {
    const outcome = scheme.decode(tokenId);
    if (!outcome) throw new RoundError('TokenNotFound');

    const { roundId } = outcome;
    if (roundId !== undefined && (roundId < 1 || roundId > rounds.currentRound)) {
        throw new RoundError('TokenNotFound');
    }

    if (outcome.kind === 'loss') return lossDescriptor(sources, roundId);

    if (roundId === undefined) {
        return withExternalUrl(
            {
                name: 'Trivia Winner',
                description: 'Awarded to the winner of a trivia round.',
                image: sources.winImage,
                attributes: [{ trait_type: 'Outcome', value: 'Win' }],
            },
            sources,
        );
    }

    const round = rounds.getRound(roundId);
    if (!round || round.cancelled) throw new RoundError('TokenNotFound');
    if (!round.won) {
        return withExternalUrl(
            {
                name: `Trivia Round #${roundId}: Pending`,
                description: 'This round has not been won yet.',
                image: sources.pendingImage,
                attributes: [
                    { trait_type: 'Outcome', value: 'Pending' },
                    { trait_type: 'Round', value: roundId },
                ],
            },
            sources,
        );
    }

    const winnerName = round.winnerDisplayName ?? round.winner ?? 'unknown';
    return withExternalUrl(
        {
            name: `Trivia Round #${roundId}: Winner`,
            description: `${winnerName} answered all questions of round ${roundId} correctly.`,
            image: sources.winImage,
            attributes: [
                { trait_type: 'Outcome', value: 'Win' },
                { trait_type: 'Round', value: roundId },
                { trait_type: 'Winner', value: winnerName },
            ],
        },
        sources,
    );
}
