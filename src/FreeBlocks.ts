import { Strategy } from "./constants";
import { Block, blockSize } from "./Partition";

type Blocks = readonly Readonly<Block>[];

export function firstFit(blocks:Blocks, size:number) {
    for (let i = 0; i < blocks.length; i++) {
        if (blocks[i].owner == null && blockSize(blocks[i]) >= size) {
            return i;
        }
    }
    return -1;
}
export function bestFit(blocks:Blocks, size:number) {
    let index = -1;
    let bestSize = Infinity;
    for (let i = 0; i < blocks.length; i++) {
        if (blocks[i].owner == null) {
            const space = blockSize(blocks[i]);
            // Strict comparison keeps the lowest address on ties
            if (space >= size && space < bestSize) {
                bestSize = space;
                index = i;
            }
        }
    }
    return index;
}
export function worstFit(blocks:Blocks, size:number) {
    let index = -1;
    let worstSize = 0;
    for (let i = 0; i < blocks.length; i++) {
        if (blocks[i].owner == null) {
            const space = blockSize(blocks[i]);
            if (space >= size && space > worstSize) {
                worstSize = space;
                index = i;
            }
        }
    }
    return index;
}
export function findFreeBlock(blocks:Blocks, size:number, strategy:Strategy) {
    switch (strategy) {
        case Strategy.FIRST_FIT:
            return firstFit(blocks, size);
        case Strategy.BEST_FIT:
            return bestFit(blocks, size);
        case Strategy.WORST_FIT:
            return worstFit(blocks, size);
        default:
            throw new Error("Invalid strategy");
    }
}
export function parseStrategy(letter:string) {
    switch (letter.toUpperCase()) {
        case Strategy.FIRST_FIT:
            return Strategy.FIRST_FIT;
        case Strategy.BEST_FIT:
            return Strategy.BEST_FIT;
        case Strategy.WORST_FIT:
            return Strategy.WORST_FIT;
        default:
            return null;
    }
}
