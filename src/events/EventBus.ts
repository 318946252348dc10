import { EventEmitter } from "node:events"

import type { SwarmEvent } from "./types.js"

type EventHandler = (event: SwarmEvent) => void

type EventOfType<T extends SwarmEvent["type"]> = Extract<SwarmEvent, { type: T }>

export class EventBus {
    private emitter: EventEmitter = new EventEmitter()

    public on(handler: EventHandler): void {
        this.emitter.on("event", handler)
    }

    /**
     * Subscribe to a single event type. Returns the unsubscribe function.
     */
    public onType<T extends SwarmEvent["type"]>(
        type: T,
        handler: (event: EventOfType<T>) => void
    ): () => void {
        const filtered = (event: SwarmEvent): void => {
            if (isOfType(event, type)) handler(event)
        }
        this.emitter.on("event", filtered)
        return (): void => {
            this.emitter.off("event", filtered)
        }
    }

    public emit(event: SwarmEvent): void {
        this.emitter.emit("event", event)
    }

    public off(handler: EventHandler): void {
        this.emitter.off("event", handler)
    }
}

function isOfType<T extends SwarmEvent["type"]>(
    event: SwarmEvent,
    type: T
): event is EventOfType<T> {
    return event.type === type
}
