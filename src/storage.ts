import * as fs from "fs";
import * as path from "path";

/**
 * Whole-document storage keyed by path.
 * The store only ever reads a document in full or replaces it in full.
 */
export interface StorageBackend {
	/** Return the full content, or null when the resource is absent or unreadable. */
	read(location: string): string | null;

	/** Replace the content at `location`. Throws on failure. */
	write(location: string, content: string): void;
}

/**
 * UTF-8 files on the local filesystem.
 * Writes go to a sibling temp file that is renamed over the target, so
 * readers never observe a half-written document.
 */
export class FileStorage implements StorageBackend {
	read(location: string): string | null {
		try {
			return fs.readFileSync(location, "utf-8");
		} catch {
			return null;
		}
	}

	write(location: string, content: string): void {
		const target = path.resolve(location);
		fs.mkdirSync(path.dirname(target), { recursive: true });

		const tempPath = `${target}.${process.pid}.tmp`;
		try {
			fs.writeFileSync(tempPath, content, "utf-8");
			fs.renameSync(tempPath, target);
		} catch (err) {
			// Only remove a temp file this write produced
			if (fs.statSync(tempPath, { throwIfNoEntry: false })?.isFile()) {
				fs.rmSync(tempPath);
			}
			throw err;
		}
	}
}

/**
 * In-process storage backed by a Map, for tests and scratch stores.
 */
export class MemoryStorage implements StorageBackend {
	private readonly _files = new Map<string, string>();

	constructor(initial: Record<string, string> = {}) {
		for (const [location, content] of Object.entries(initial)) {
			this._files.set(location, content);
		}
	}

	read(location: string): string | null {
		return this._files.get(location) ?? null;
	}

	write(location: string, content: string): void {
		this._files.set(location, content);
	}

	has(location: string): boolean {
		return this._files.has(location);
	}

	contents(location: string): string | undefined {
		return this._files.get(location);
	}
}
