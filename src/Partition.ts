export type Block = {
    start:number;
    end:number;
    owner:string|null;
};
export function blockSize(block:Readonly<Block>) {
    return block.end - block.start + 1;
}
export class Partition {
    private _blocks:Block[];
    constructor(readonly capacity:number) {
        this._blocks = [{
            start: 0,
            end: capacity - 1,
            owner: null
        }];
    }
    get blocks():readonly Readonly<Block>[] {
        return this._blocks;
    }
    private _sort() {
        for (let i = 1; i < this._blocks.length; i++) {
            if (this._blocks[i - 1].start > this._blocks[i].start) {
                this._blocks.sort((a, b) => a.start - b.start);
                return;
            }
        }
    }
    setAllocation() {
        // Assume adding in ascending order. The new list replaces the current one only on finish()
        const blocks:Block[] = [];
        return {
            add: (start:number, end:number, owner:string|null) => {
                const block:Block = {
                    start: start,
                    end: end,
                    owner: owner
                };
                blocks.push(block);
                return block;
            },
            finish: () => {
                this._blocks = blocks;
                return blocks.length;
            }
        };
    }
    split(index:number, size:number, owner:string) {
        const block = this._blocks[index];
        if (!block || block.owner != null || blockSize(block) < size) {
            throw new Error("Free block not found"); // Never should happen
        }
        const allocated:Block = {
            start: block.start,
            end: block.start + size - 1,
            owner: owner
        };
        if (allocated.end === block.end) {
            // Exact fit, the free block is replaced
            this._blocks[index] = allocated;
        } else {
            block.start = allocated.end + 1;
            this._blocks.splice(index, 0, allocated);
        }
        return allocated;
    }
    free(owner:string) {
        let freed = 0;
        for (const block of this._blocks) {
            if (block.owner === owner) {
                block.owner = null;
                freed++;
            }
        }
        if (freed > 0) {
            this.coalesce();
        }
        return freed;
    }
    coalesce() {
        this._sort();
        let i = 0;
        while (i < this._blocks.length - 1) {
            const block = this._blocks[i];
            const next = this._blocks[i + 1];
            if (block.owner == null && next.owner == null) {
                block.end = next.end;
                this._blocks.splice(i + 1, 1);
                // Stay on the same block so chains of free blocks collapse into one
            } else {
                i++;
            }
        }
    }
    compact() {
        this._sort();
        const allocation = this.setAllocation();
        let nextStart = 0;
        let moved = 0;
        for (const block of this._blocks) {
            if (block.owner != null) {
                const size = blockSize(block);
                if (block.start !== nextStart) {
                    moved++;
                }
                allocation.add(nextStart, nextStart + size - 1, block.owner);
                nextStart += size;
            }
        }
        if (nextStart < this.capacity) {
            allocation.add(nextStart, this.capacity - 1, null);
        }
        allocation.finish();
        return moved;
    }
    verify() {
        let nextStart = 0;
        let previousFree = false;
        for (const block of this._blocks) {
            if (block.start < nextStart) {
                throw new Error(`Block at ${block.start} overlaps or is out of order`);
            } else if (block.start > nextStart) {
                throw new Error(`Gap at ${nextStart}`);
            }
            if (block.end < block.start) {
                throw new Error(`Block at ${block.start} has no size`);
            }
            if (block.owner == null) {
                if (previousFree) {
                    throw new Error(`Adjacent free blocks at ${block.start}`);
                }
                previousFree = true;
            } else {
                if (!block.owner) {
                    throw new Error(`Block at ${block.start} has an empty owner`);
                }
                previousFree = false;
            }
            nextStart = block.end + 1;
        }
        if (nextStart !== this.capacity) {
            throw new Error(`Blocks cover ${nextStart} of ${this.capacity}`);
        }
    }
}
