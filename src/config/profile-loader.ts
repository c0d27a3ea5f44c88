import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { parseProfileYaml } from '../boundaries/profile-parser';
import { chunk } from '../chunking/emitter';
import type { Chunk, ChunkOptions, Document, Tokenizer } from '../chunking/types';
import { ConfigurationError, ProcessingError, handleUnknownError } from '../errors/index';
import type { ChunkingProfile, ProfileFile } from '../schemas/profile-schemas';
import { DEFAULT_PROFILE_FILENAME, LEGACY_PROFILE_FILENAME } from './constants';

export interface ProfileRuntime {
    tokenizer?: Tokenizer;
}

/**
 * Options part of a profile, in the shape chunk() takes.
 */
export function profileOptions(profile: ChunkingProfile, runtime: ProfileRuntime = {}): ChunkOptions {
    return {
        markdownAware: profile.markdownAware,
        regexKeep: profile.regexKeep,
        splitOversizedFences: profile.splitOversizedFences,
        semanticWindow: profile.semanticWindow,
        topicShiftThreshold: profile.topicShiftThreshold,
        ...(profile.unit !== undefined && { unit: profile.unit }),
        ...(profile.regexPattern !== undefined && { regexPattern: profile.regexPattern }),
        ...(profile.sentenceAbbreviations !== undefined && { sentenceAbbreviations: profile.sentenceAbbreviations }),
        ...(runtime.tokenizer !== undefined && { tokenizer: runtime.tokenizer }),
    };
}

/**
 * Loads named chunking profiles from `.chunkwright.yaml` (or
 * `chunkwright.yaml`) in a directory, or from an explicit file.
 */
export class ProfileLoader {
    private file: ProfileFile | null = null;
    private readonly profilePath: string;

    constructor(cwd: string = process.cwd(), profilePath?: string) {
        if (profilePath) {
            this.profilePath = path.resolve(cwd, profilePath);
            return;
        }
        const hidden = path.resolve(cwd, DEFAULT_PROFILE_FILENAME);
        const legacy = path.resolve(cwd, LEGACY_PROFILE_FILENAME);
        this.profilePath = existsSync(hidden) || !existsSync(legacy) ? hidden : legacy;
    }

    getProfilePath(): string {
        return this.profilePath;
    }

    /**
     * Reads and validates the profile file once.
     */
    load(): ProfileFile {
        if (this.file) return this.file;

        if (!existsSync(this.profilePath)) {
            throw new ConfigurationError(
                `Missing chunking profiles at ${this.profilePath} (expected ${DEFAULT_PROFILE_FILENAME} or ${LEGACY_PROFILE_FILENAME})`
            );
        }

        let content: string;
        try {
            content = readFileSync(this.profilePath, 'utf-8');
        } catch (e: unknown) {
            const err = handleUnknownError(e, 'Reading profiles');
            throw new ProcessingError(`Failed to read ${this.profilePath}: ${err.message}`);
        }
        this.file = parseProfileYaml(content);
        return this.file;
    }

    getAvailableProfiles(): string[] {
        return Object.keys(this.load().profiles);
    }

    getProfile(name: string): ChunkingProfile {
        const profile = this.load().profiles[name];
        if (!profile) {
            const available = this.getAvailableProfiles().join(', ');
            throw new ConfigurationError(
                `Unknown chunking profile: '${name}'. Available profiles: ${available || 'none'}`
            );
        }
        return profile;
    }

    chunkWithProfile(document: Document, name: string, runtime: ProfileRuntime = {}): Chunk[] {
        const profile = this.getProfile(name);
        return chunk(
            document,
            profile.strategy,
            profile.maxChunkSize,
            profile.overlapSize,
            profileOptions(profile, runtime)
        );
    }
}
