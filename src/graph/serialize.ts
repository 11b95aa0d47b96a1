import { writeFile } from 'node:fs/promises';
import YAML from 'yaml';
import { deepClone } from '../lib/paths';
import type { GraphDocument } from './schema';
import type { CompiledGraph } from './types';

export type GraphFormat = 'yaml' | 'json';

/**
 * Mutable copy of the document a compiled graph was built from.
 * Used by the applier as the base for the next version.
 */
export function toDocument(graph: CompiledGraph): GraphDocument {
    return deepClone(graph.document);
}

export function dumpGraph(document: GraphDocument, format: GraphFormat = 'yaml'): string {
    if (format === 'json') {
        return JSON.stringify(document, null, 2) + '\n';
    }
    return YAML.stringify(document);
}

export async function saveGraphFile(filePath: string, document: GraphDocument): Promise<void> {
    const format: GraphFormat = filePath.endsWith('.json') ? 'json' : 'yaml';
    await writeFile(filePath, dumpGraph(document, format), 'utf8');
}
