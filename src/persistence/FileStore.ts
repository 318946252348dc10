import { mkdir, readFile, rename, stat, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

import type { z } from "zod"

import { ConfigurationError, toErrorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"

/**
 * Key/value files under one directory. Writes go to a temp file first and
 * are renamed into place, so readers never see a half-written file.
 */
export class FileStore {
    private readonly basePath: string

    constructor(basePath: string) {
        this.basePath = basePath
    }

    public async write(key: string, data: unknown): Promise<string> {
        return this.writeAtomic(
            this.keyToPath(key),
            JSON.stringify(data, null, 2)
        )
    }

    /** Writes `name` verbatim (no `.json` suffix). */
    public async writeText(name: string, content: string): Promise<string> {
        return this.writeAtomic(join(this.basePath, name), content)
    }

    public async read<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
        const filePath = this.keyToPath(key)
        let content: string
        try {
            content = await readFile(filePath, "utf-8")
        } catch (error) {
            if (isNotFound(error)) return null
            log.persistence("Failed to read %s: %s", key, toErrorMessage(error))
            throw error
        }
        const parsed = schema.safeParse(JSON.parse(content))
        if (!parsed.success) {
            throw new ConfigurationError(
                `Stored record ${key} is malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`
            )
        }
        return parsed.data
    }

    public async exists(key: string): Promise<boolean> {
        try {
            await stat(this.keyToPath(key))
            return true
        } catch (error) {
            if (isNotFound(error)) return false
            throw error
        }
    }

    private async writeAtomic(filePath: string, content: string): Promise<string> {
        const tempPath = `${filePath}.tmp.${Date.now()}`
        await mkdir(dirname(filePath), { recursive: true })

        try {
            await writeFile(tempPath, content, "utf-8")
            await rename(tempPath, filePath)
        } catch (error) {
            log.persistence(
                "Failed to write %s: %s",
                filePath,
                toErrorMessage(error)
            )
            throw error
        }
        return filePath
    }

    private keyToPath(key: string): string {
        return join(this.basePath, `${key}.json`)
    }
}

function isNotFound(error: unknown): boolean {
    return (
        error instanceof Error &&
        "code" in error &&
        error.code === "ENOENT"
    )
}
