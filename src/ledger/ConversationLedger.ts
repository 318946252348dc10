import { log } from "../core/Logger.js"
import type {
    ContextEntry,
    ContextLimits,
    LedgerEntry,
    StageId,
} from "../types.js"

const TRUNCATION_MARKER = "[… truncated]"

/**
 * Append-only record of every committed worker output in one run.
 *
 * `append` is synchronous, so callers sharing an event loop can never observe
 * the same sequence number. Snapshots are frozen copies: later appends never
 * show up in a snapshot that was already taken.
 */
export class ConversationLedger {
    private readonly entries: LedgerEntry[] = []
    private nextSequence = 1

    public append(entry: ContextEntry): number {
        const sequence = this.nextSequence++
        const stored: LedgerEntry = Object.freeze({
            workerName: entry.workerName,
            stage: entry.stage,
            content: entry.content,
            sequence,
            timestamp: new Date().toISOString(),
        })
        this.entries.push(stored)
        log.ledger(
            "Appended #%d from %s (%s, %d chars)",
            sequence,
            entry.workerName,
            entry.stage,
            entry.content.length
        )
        return sequence
    }

    public snapshot(): readonly LedgerEntry[] {
        return Object.freeze([...this.entries])
    }

    public entriesForStage(stage: StageId): LedgerEntry[] {
        return this.entries.filter((e) => e.stage === stage)
    }

    public get size(): number {
        return this.entries.length
    }
}

function renderEntry(entry: ContextEntry): string {
    return `[${entry.stage}] ${entry.workerName}\n${entry.content}`
}

function omittedLine(count: number): string {
    return `[… ${count} earlier ${count === 1 ? "entry" : "entries"} omitted]`
}

function join(entries: readonly ContextEntry[], omitted: number): string {
    const blocks = entries.map(renderEntry)
    if (omitted > 0) blocks.unshift(omittedLine(omitted))
    return blocks.join("\n\n")
}

/**
 * Serialize entries into the context handed to the next worker call.
 *
 * Oldest entries are dropped first: `maxEntries` keeps the newest N, then
 * `maxChars` drops whole entries from the front until the text fits. When the
 * newest entry alone is over budget its content keeps only its tail. The
 * result never exceeds `maxChars`.
 */
export function renderContext(
    entries: readonly ContextEntry[],
    limits: ContextLimits = {}
): string {
    let kept = entries
    if (limits.maxEntries !== undefined && kept.length > limits.maxEntries) {
        kept = kept.slice(kept.length - Math.max(0, limits.maxEntries))
    }

    const maxChars = limits.maxChars
    if (maxChars === undefined) {
        return join(kept, entries.length - kept.length)
    }

    let text = join(kept, entries.length - kept.length)
    while (text.length > maxChars && kept.length > 1) {
        kept = kept.slice(1)
        text = join(kept, entries.length - kept.length)
    }
    if (text.length <= maxChars || kept.length === 0) {
        return text
    }

    const last = kept[0]
    const omitted = entries.length - 1
    const overhead =
        join([{ ...last, content: "" }], omitted).length +
        TRUNCATION_MARKER.length
    if (overhead >= maxChars) {
        // No room for headers; keep only the newest content.
        return last.content.slice(-maxChars)
    }
    const tail = last.content.slice(-(maxChars - overhead))
    return join([{ ...last, content: TRUNCATION_MARKER + tail }], omitted)
}
