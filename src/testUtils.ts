import * as Assert from "assert";
import { Readable } from "stream";

import type { Allocator } from "./Allocator";

// Force equal types
export function assertDeepEqual<T>(a:T, b:NoInfer<T>) {
    return Assert.deepStrictEqual(a, b);
}
export function assertEqual<T>(a:T, b:NoInfer<T>) {
    return Assert.strictEqual(a, b);
}

export function newOutput() {
    const chunks:string[] = [];
    return {
        write(text:string) {
            chunks.push(text);
        },
        get text() {
            return chunks.join("");
        }
    };
}
export function newInput(lines:string[]) {
    return Readable.from([Buffer.from(lines.map(line => `${line}\n`).join(""))]);
}

// Deterministic LCG so sequences are reproducible between runs
export function newRandom(seed:number) {
    let state = seed >>> 0;
    return {
        next() {
            state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
            return state / 0x100000000;
        },
        int(min:number, max:number) {
            return min + Math.floor(this.next() * (max - min + 1));
        }
    };
}

export function layout(allocator:Allocator) {
    return allocator.status().map(block => [block.start, block.end, block.owner] as const);
}
