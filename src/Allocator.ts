import { AllocateError } from "./constants";
import { findFreeBlock, parseStrategy } from "./FreeBlocks";
import { Block, Partition, blockSize } from "./Partition";

export type AllocatorOptions = {
    capacity:number;
    duplicateOwners?:boolean;
    verify?:boolean;
};
export type BlockStatus = {
    start:number;
    end:number;
    size:number;
    owner:string|null;
};
export type AllocateResult = {
    success:true;
    block:BlockStatus;
} | {
    success:false;
    error:AllocateError;
};
export type Usage = {
    capacity:number;
    allocated:number;
    free:number;
    freeBlocks:number;
    largestFree:number;
    fragmentation:number;
};
function toStatus(block:Readonly<Block>):BlockStatus {
    return {
        start: block.start,
        end: block.end,
        size: blockSize(block),
        owner: block.owner
    };
}
function isPositiveInteger(value:number) {
    return Number.isSafeInteger(value) && value > 0;
}
/**
 * Contiguous allocator over `[0, capacity)`. Not meant to be shared: every
 * operation is a synchronous read-modify-write over the whole partition.
 */
export class Allocator {
    private _partition;
    readonly capacity;
    readonly duplicateOwners;
    readonly verify;
    constructor(options:AllocatorOptions) {
        if (!isPositiveInteger(options.capacity)) {
            throw new Error("Invalid capacity");
        }
        this.capacity = options.capacity;
        this.duplicateOwners = options.duplicateOwners ?? false;
        this.verify = options.verify ?? false;
        this._partition = new Partition(this.capacity);
    }
    private _verify() {
        if (this.verify) {
            this._partition.verify();
        }
    }
    holds(owner:string) {
        return this._partition.blocks.some(block => block.owner === owner);
    }
    /**
     * Places `size` units for `owner` using the strategy letter (F, B or W,
     * any case). An unknown letter, running out of space or, unless
     * `duplicateOwners` is set, an owner that already holds a block are
     * returned as failures and leave the partition untouched.
     */
    allocate(owner:string, size:number, strategyCode:string):AllocateResult {
        if (!owner) {
            throw new Error("Invalid owner");
        }
        if (!isPositiveInteger(size)) {
            throw new Error("Invalid size");
        }
        const strategy = parseStrategy(strategyCode);
        if (strategy == null) {
            return {
                success: false,
                error: AllocateError.INVALID_STRATEGY
            };
        }
        if (!this.duplicateOwners && this.holds(owner)) {
            return {
                success: false,
                error: AllocateError.OWNER_ACTIVE
            };
        }
        const index = findFreeBlock(this._partition.blocks, size, strategy);
        if (index < 0) {
            return {
                success: false,
                error: AllocateError.NO_SPACE
            };
        }
        const block = this._partition.split(index, size, owner);
        this._verify();
        return {
            success: true,
            block: toStatus(block)
        };
    }
    release(owner:string) {
        if (this._partition.free(owner) > 0) {
            this._verify();
            return true;
        } else {
            return false;
        }
    }
    /**
     * Packs every allocated block towards address 0 keeping their order.
     * Returns how many blocks changed their start address.
     */
    compact() {
        const moved = this._partition.compact();
        this._verify();
        return moved;
    }
    status() {
        return this._partition.blocks.map(toStatus);
    }
    usage():Usage {
        let allocated = 0;
        let free = 0;
        let freeBlocks = 0;
        let largestFree = 0;
        for (const block of this._partition.blocks) {
            const size = blockSize(block);
            if (block.owner == null) {
                free += size;
                freeBlocks++;
                if (size > largestFree) {
                    largestFree = size;
                }
            } else {
                allocated += size;
            }
        }
        return {
            capacity: this.capacity,
            allocated: allocated,
            free: free,
            freeBlocks: freeBlocks,
            largestFree: largestFree,
            fragmentation: free === 0 ? 0 : 1 - (largestFree / free)
        };
    }
}
