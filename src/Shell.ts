import { Allocator } from "./Allocator";
import { AllocateError, Commands, Strategy } from "./constants";
import { parseStrategy } from "./FreeBlocks";
import { formatBlock, parseSize, tokenize } from "./utils";

export type Command = {
    type:Commands.REQUEST;
    owner:string;
    size:number;
    strategy:Strategy;
} | {
    type:Commands.RELEASE;
    owner:string;
} | {
    type:Commands.COMPACT|Commands.STATUS|Commands.EXIT;
} | {
    type:"error";
    message:string;
} | {
    type:"empty";
};
export type ShellContext = {
    write(text:string):void;
};
const USAGE:Record<Commands, string> = {
    [Commands.REQUEST]: "RQ <owner> <size> <F|B|W>",
    [Commands.RELEASE]: "RL <owner>",
    [Commands.COMPACT]: "C",
    [Commands.STATUS]: "STAT",
    [Commands.EXIT]: "X"
};
function usageError(command:Commands):Command {
    return {
        type: "error",
        message: `Error: Usage: ${USAGE[command]}`
    };
}
export function parseCommand(line:string):Command {
    const [keyword, ...args] = tokenize(line);
    if (keyword == null) {
        return { type: "empty" };
    }
    switch (keyword) {
        case Commands.REQUEST: {
            if (args.length !== 3) {
                return usageError(Commands.REQUEST);
            }
            const [owner, sizeText, letter] = args;
            const size = parseSize(sizeText);
            if (size == null) {
                return {
                    type: "error",
                    message: `Error: Invalid size "${sizeText}"`
                };
            }
            const strategy = parseStrategy(letter);
            if (strategy == null) {
                return {
                    type: "error",
                    message: `Error: Invalid allocation strategy "${letter}"`
                };
            }
            return {
                type: Commands.REQUEST,
                owner: owner,
                size: size,
                strategy: strategy
            };
        }
        case Commands.RELEASE: {
            if (args.length !== 1) {
                return usageError(Commands.RELEASE);
            }
            return {
                type: Commands.RELEASE,
                owner: args[0]
            };
        }
        case Commands.COMPACT:
            return args.length === 0 ? { type: Commands.COMPACT } : usageError(Commands.COMPACT);
        case Commands.STATUS:
            return args.length === 0 ? { type: Commands.STATUS } : usageError(Commands.STATUS);
        case Commands.EXIT:
            return args.length === 0 ? { type: Commands.EXIT } : usageError(Commands.EXIT);
        default:
            return {
                type: "error",
                message: `Unknown command "${keyword}"`
            };
    }
}
export class Shell {
    constructor(readonly allocator:Allocator, private _context:ShellContext) {}
    private _print(line:string) {
        this._context.write(`${line}\n`);
    }
    private _request(owner:string, size:number, strategy:Strategy) {
        const result = this.allocator.allocate(owner, size, strategy);
        if (result.success) {
            this._print(`Successfully allocated ${size} bytes to ${owner}`);
        } else if (result.error === AllocateError.OWNER_ACTIVE) {
            this._print(`Error: Process ${owner} already holds memory`);
        } else if (result.error === AllocateError.INVALID_STRATEGY) {
            this._print(`Error: Invalid allocation strategy "${strategy}"`);
        } else {
            this._print(`Error: Cannot allocate ${size} bytes to ${owner}`);
        }
    }
    private _release(owner:string) {
        if (this.allocator.release(owner)) {
            this._print(`Successfully released memory for ${owner}`);
        } else {
            this._print(`Error: Process ${owner} not found`);
        }
    }
    /**
     * Runs one input line. Returns false once the exit command is read.
     */
    execute(line:string) {
        const command = parseCommand(line);
        switch (command.type) {
            case Commands.REQUEST:
                this._request(command.owner, command.size, command.strategy);
                break;
            case Commands.RELEASE:
                this._release(command.owner);
                break;
            case Commands.COMPACT:
                this.allocator.compact();
                this._print("Memory compacted");
                break;
            case Commands.STATUS:
                for (const block of this.allocator.status()) {
                    this._print(formatBlock(block));
                }
                break;
            case Commands.EXIT:
                return false;
            case "error":
                this._print(command.message);
                break;
            case "empty":
                break;
        }
        return true;
    }
}
