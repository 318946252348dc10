import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { z } from "zod"

import { ConfigurationError } from "../core/errors.js"
import { FileStore } from "../persistence/FileStore.js"

const recordSchema = z.object({ name: z.string(), value: z.number() })

describe("FileStore", () => {
    let store: FileStore
    let tempDir: string

    beforeEach(async () => {
        tempDir = await mkdtemp(join(tmpdir(), "swarm-store-"))
        store = new FileStore(tempDir)
    })

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true })
    })

    it("should write and read data", async () => {
        const data = { name: "test", value: 42 }
        await store.write("test-key", data)
        expect(await store.read("test-key", recordSchema)).toEqual(data)
    })

    it("should return null for non-existent keys", async () => {
        expect(await store.read("does-not-exist", recordSchema)).toBeNull()
    })

    it("should reject a record that fails its schema", async () => {
        await store.write("bad", { name: "x", value: "not a number" })
        await expect(store.read("bad", recordSchema)).rejects.toBeInstanceOf(
            ConfigurationError
        )
    })

    it("should check existence correctly", async () => {
        expect(await store.exists("missing")).toBe(false)
        await store.write("present", { ok: true })
        expect(await store.exists("present")).toBe(true)
    })

    it("should create nested directories for nested keys", async () => {
        const path = await store.write("runs/abc-123", { name: "n", value: 1 })
        expect(path).toBe(join(tempDir, "runs", "abc-123.json"))
        expect(await store.read("runs/abc-123", recordSchema)).toEqual({ name: "n", value: 1 })
    })

    it("should overwrite existing data and leave no temp files", async () => {
        await store.write("key", { name: "v", value: 1 })
        await store.write("key", { name: "v", value: 2 })
        expect((await store.read("key", recordSchema))?.value).toBe(2)
        expect(await readdir(tempDir)).toEqual(["key.json"])
    })

    it("should write text files verbatim", async () => {
        const path = await store.writeText("notes/report.md", "# Title\n")
        expect(await readFile(path, "utf-8")).toBe("# Title\n")
    })

    it("should surface JSON syntax errors", async () => {
        await writeFile(join(tempDir, "broken.json"), "{", "utf-8")
        await expect(store.read("broken", recordSchema)).rejects.toThrow(SyntaxError)
    })
})
