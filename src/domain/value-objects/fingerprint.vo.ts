import { z } from 'zod/v4';

/**
 * Content hash assigned to stories without any body text.
 * Never considered a match, since empty bodies say nothing about the story.
 */
export const EMPTY_CONTENT_HASH = 'empty';

export const fingerprintSchema = z.object({
    contentHash: z.string().min(1),
    titleHash: z.string().min(1),
    url: z.string().min(1),
});

export type FingerprintProps = z.infer<typeof fingerprintSchema>;

/**
 * @description Identity signature of a story, derived from its URL, title and body
 */
export class Fingerprint {
    public readonly contentHash: string;
    public readonly titleHash: string;
    public readonly url: string;

    constructor(props: FingerprintProps) {
        const validated = fingerprintSchema.parse(props);
        this.contentHash = validated.contentHash;
        this.titleHash = validated.titleHash;
        this.url = validated.url;
    }

    public hasContent(): boolean {
        return this.contentHash !== EMPTY_CONTENT_HASH;
    }

    public sharesContentWith(other: Fingerprint): boolean {
        return this.hasContent() && this.contentHash === other.contentHash;
    }

    public toJSON(): FingerprintProps {
        return {
            contentHash: this.contentHash,
            titleHash: this.titleHash,
            url: this.url,
        };
    }
}
