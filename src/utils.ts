import type { BlockStatus } from "./Allocator";

export function parseSize(text:string) {
    const trimmed = text.trim();
    if (!/^\d+$/.test(trimmed)) {
        return null;
    }
    const size = Number(trimmed);
    if (!Number.isSafeInteger(size) || size <= 0) {
        return null;
    }
    return size;
}
export function formatBlock(block:BlockStatus) {
    const status = block.owner == null ? "Unused" : `Process ${block.owner}`;
    return `Addresses [${block.start}:${block.end}] (${block.size}) ${status}`;
}
export function tokenize(line:string) {
    const trimmed = line.trim();
    return trimmed ? trimmed.split(/\s+/) : [];
}
