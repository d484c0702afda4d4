import { InvokeOptions } from '../logic/gemini/gemini.service';

export type ScriptedReply = string | Error | ((prompt: string) => string);

export interface RecordedCall {
    prompt: string;
    options: InvokeOptions;
}

/** Stands in for GeminiService: replies are consumed in order, then `fallback` repeats. */
export class FakeGeminiService {
    readonly calls: RecordedCall[] = [];
    private readonly replies: ScriptedReply[] = [];

    constructor(private readonly fallback: ScriptedReply = 'ok') {}

    queue(...replies: ScriptedReply[]): this {
        this.replies.push(...replies);
        return this;
    }

    async invoke(prompt: string, options: InvokeOptions = {}): Promise<string> {
        this.calls.push({ prompt, options });
        const reply = this.replies.shift() ?? this.fallback;
        if (reply instanceof Error) {
            throw reply;
        }
        return typeof reply === 'function' ? reply(prompt) : reply;
    }
}
