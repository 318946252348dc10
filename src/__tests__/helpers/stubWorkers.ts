import type { InvokeOptions, Worker } from "../../types.js"

export interface RecordedCall {
    task: string
    context: string
}

/** A worker whose behavior is a plain function; every call is recorded. */
export class StubWorker implements Worker {
    public readonly name: string
    public readonly calls: RecordedCall[] = []
    private readonly behavior: (
        call: RecordedCall,
        callIndex: number,
        options: InvokeOptions
    ) => Promise<string>

    constructor(
        name: string,
        behavior: (
            call: RecordedCall,
            callIndex: number,
            options: InvokeOptions
        ) => Promise<string>
    ) {
        this.name = name
        this.behavior = behavior
    }

    public invoke(
        task: string,
        context: string,
        options: InvokeOptions
    ): Promise<string> {
        const call = { task, context }
        this.calls.push(call)
        return this.behavior(call, this.calls.length - 1, options)
    }
}

export function echoWorker(name: string): StubWorker {
    return new StubWorker(name, () => Promise.resolve(`${name} says hi`))
}

export function failingWorker(name: string, message = "boom"): StubWorker {
    return new StubWorker(name, () => Promise.reject(new Error(message)))
}

/** Fails the first `failures` calls, then answers. */
export function flakyWorker(name: string, failures: number): StubWorker {
    return new StubWorker(name, (_call, index) =>
        index < failures
            ? Promise.reject(new Error(`${name} flaked`))
            : Promise.resolve(`${name} recovered`)
    )
}

/** Never settles on its own; only the abort signal ends it. */
export function hangingWorker(name: string): StubWorker {
    return new StubWorker(
        name,
        (_call, _index, options) =>
            new Promise<string>((_, reject) => {
                options.signal.addEventListener(
                    "abort",
                    () => reject(new Error("aborted")),
                    { once: true }
                )
            })
    )
}

export function delayedWorker(name: string, ms: number, answer: string): StubWorker {
    return new StubWorker(
        name,
        () =>
            new Promise<string>((resolve) => {
                setTimeout(() => resolve(answer), ms)
            })
    )
}
