import * as Readline from "readline";
import * as Util from "util";

import { Allocator } from "./Allocator";
import { Prompts } from "./constants";
import { Shell, ShellContext } from "./Shell";
import { parseSize } from "./utils";

export type CliOptions = {
    capacity:number|null;
    duplicateOwners:boolean;
    verify:boolean;
};
export type CliContext = {
    input:NodeJS.ReadableStream;
} & ShellContext;
export function parseCliOptions(argv:string[]):CliOptions {
    const { values } = Util.parseArgs({
        args: argv,
        options: {
            "capacity": { type: "string" },
            "allow-duplicate-owners": { type: "boolean" },
            "verify": { type: "boolean" }
        },
        strict: true,
        allowPositionals: false
    });
    let capacity:number|null = null;
    if (values.capacity != null) {
        capacity = parseSize(values.capacity);
        if (capacity == null) {
            throw new Error(`Invalid memory size "${values.capacity}"`);
        }
    }
    return {
        capacity: capacity,
        duplicateOwners: values["allow-duplicate-owners"] ?? false,
        verify: values.verify ?? false
    };
}
/**
 * Reads the memory size (unless given) and then one command per line until
 * `X` or the end of the input.
 */
export async function run(options:CliOptions, context:CliContext) {
    const lines = Readline.createInterface({
        input: context.input,
        terminal: false,
        crlfDelay: Infinity
    });
    try {
        const reader = lines[Symbol.asyncIterator]();
        let capacity = options.capacity;
        if (capacity == null) {
            context.write(Prompts.CAPACITY);
            const answer = await reader.next();
            if (answer.done) {
                throw new Error("Memory size not provided");
            }
            capacity = parseSize(answer.value);
            if (capacity == null) {
                throw new Error(`Invalid memory size "${answer.value.trim()}"`);
            }
        }
        const shell = new Shell(new Allocator({
            capacity: capacity,
            duplicateOwners: options.duplicateOwners,
            verify: options.verify
        }), context);
        while (true) {
            context.write(Prompts.COMMAND);
            const line = await reader.next();
            if (line.done || !shell.execute(line.value)) {
                break;
            }
        }
    } finally {
        lines.close();
    }
}
export async function main(argv:string[], context:CliContext) {
    await run(parseCliOptions(argv), context);
}
