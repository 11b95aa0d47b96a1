/**
 * JSON Lines fact store: one committed fact per line, append only.
 *
 * @example
 * ```typescript
 * const memory = new FileFactStore({ filePath: './data/sediment.jsonl' });
 * ```
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { SluiceError } from '../lib/errors';
import { factKindSchema } from '../graph/schema';
import type { FactStoreConfig } from './fact-store';
import { AppendOnlyFactStore } from './fact-store';
import type { Fact } from './types';

export interface FileFactStoreConfig extends FactStoreConfig {
    filePath: string;
}

const tripletSchema = z.object({
    subject: z.string(),
    predicate: z.string(),
    object: z.string(),
});

const factRecordSchema = z.object({
    factId: z.string(),
    text: z.string(),
    confidence: z.number().min(0).max(1),
    kind: factKindSchema,
    triplets: z.array(tripletSchema),
    tags: z.array(z.string()),
    provenance: z.object({
        runId: z.string(),
        nodeId: z.string(),
        timestamp: z.number(),
        source: z.string(),
    }),
    supersedes: z.string().optional(),
    flagged: z.boolean(),
    conflictsWith: z.array(z.string()),
    sequence: z.number().int().positive(),
});

export class FileFactStore extends AppendOnlyFactStore {
    private readonly filePath: string;

    constructor(config: FileFactStoreConfig) {
        super(config);
        this.filePath = config.filePath;
    }

    protected async loadRecords(): Promise<Fact[]> {
        let content: string;
        try {
            content = await readFile(this.filePath, 'utf8');
        } catch (error) {
            if (isMissingFile(error)) return [];
            throw error;
        }

        const facts: Fact[] = [];
        content.split('\n').forEach((line, i) => {
            if (line.trim() === '') return;
            const parsed = factRecordSchema.safeParse(JSON.parse(line));
            if (!parsed.success) {
                throw new SluiceError(`Corrupt fact record at ${this.filePath}:${i + 1}: ${parsed.error.errors[0]?.message ?? 'invalid'}`);
            }
            facts.push(parsed.data);
        });
        return facts;
    }

    protected async appendRecords(facts: Fact[]): Promise<void> {
        await mkdir(dirname(this.filePath), { recursive: true });
        await appendFile(this.filePath, facts.map(f => JSON.stringify(f)).join('\n') + '\n', 'utf8');
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
