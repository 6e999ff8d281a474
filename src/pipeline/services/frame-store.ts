import fs from "fs/promises";
import { FramePathTemplate } from "../frame-path.js";



/**
 * Filesystem collaborator. Frame files double as the cache, so this is the
 * only persisted state the pipeline reads or writes.
 */
export interface FrameStore {
    /** Frame numbers present on disk for a template, ascending. */
    listFrames(template: FramePathTemplate): Promise<number[]>;
    exists(filePath: string): Promise<boolean>;
    remove(filePath: string): Promise<void>;
    ensureDirectory(directory: string): Promise<void>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && "code" in error;
}

export class LocalFrameStore implements FrameStore {

    async listFrames(template: FramePathTemplate): Promise<number[]> {
        let entries: string[];
        try {
            entries = await fs.readdir(template.directory);
        } catch (error) {
            if (isErrnoException(error) && error.code === "ENOENT") {
                console.warn(`[FrameStore] Directory ${template.directory} does not exist`);
                return [];
            }
            throw error;
        }

        return entries
            .map(entry => template.parse(entry))
            .filter((frameNumber): frameNumber is number => frameNumber !== undefined)
            .sort((a, b) => a - b);
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            const stat = await fs.stat(filePath);
            // zero-byte files are truncated writes
            return stat.isFile() && stat.size > 0;
        } catch (error) {
            if (isErrnoException(error) && error.code === "ENOENT") return false;
            throw error;
        }
    }

    async remove(filePath: string): Promise<void> {
        await fs.rm(filePath, { force: true });
    }

    async ensureDirectory(directory: string): Promise<void> {
        await fs.mkdir(directory, { recursive: true });
    }
}
