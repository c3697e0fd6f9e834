/**
 * @file Definition Library
 *
 * Resolves definition identifiers to YAML text. Documents registered in
 * memory win; otherwise, when a directory is configured, `<id>` is read
 * from `<directory>/<id>` (with `.yaml` appended when the identifier has
 * no extension).
 *
 * @module definition
 */

import fs from 'fs';
import path from 'path';

export interface DefinitionLibraryOptions {
    /** Directory searched for `.yaml` documents. */
    directory?: string;
}

export class DefinitionLibrary {
    private readonly documents = new Map<string, string>();
    private readonly directory: string | null;

    constructor(options: DefinitionLibraryOptions = {}) {
        this.directory = options.directory ?? null;
    }

    /** Register (or replace) an in-memory document. */
    document_set(sourceId: string, text: string): void {
        this.documents.set(sourceId, text);
    }

    document_remove(sourceId: string): boolean {
        return this.documents.delete(sourceId);
    }

    /**
     * Text of a document, or null when it cannot be found.
     *
     * @throws on a file that exists but cannot be read
     */
    document_get(sourceId: string): string | null {
        const registered: string | undefined = this.documents.get(sourceId);
        if (registered !== undefined) return registered;

        const file: string | null = this.file_resolve(sourceId);
        if (!file || !fs.existsSync(file)) return null;
        return fs.readFileSync(file, 'utf-8');
    }

    /** Identifiers available in memory and in the directory, sorted. */
    ids_list(): string[] {
        const ids = new Set<string>(this.documents.keys());
        if (this.directory && fs.existsSync(this.directory)) {
            for (const entry of fs.readdirSync(this.directory)) {
                if (entry.endsWith('.yaml') || entry.endsWith('.yml')) ids.add(entry);
            }
        }
        return Array.from(ids).sort();
    }

    private file_resolve(sourceId: string): string | null {
        if (!this.directory) return null;
        const fileName: string = path.extname(sourceId) ? sourceId : `${sourceId}.yaml`;
        const resolved: string = path.resolve(this.directory, fileName);
        // Identifiers never escape the library directory.
        if (!resolved.startsWith(path.resolve(this.directory) + path.sep)) return null;
        return resolved;
    }
}
