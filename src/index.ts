export { Allocator } from "./Allocator";
export type { AllocatorOptions, AllocateResult, BlockStatus, Usage } from "./Allocator";
export { AllocateError, Strategy } from "./constants";
export { bestFit, findFreeBlock, firstFit, parseStrategy, worstFit } from "./FreeBlocks";
export { Partition, blockSize } from "./Partition";
export type { Block } from "./Partition";
export { Shell, parseCommand } from "./Shell";
export type { Command, ShellContext } from "./Shell";
export { main, parseCliOptions, run } from "./cli";
export type { CliContext, CliOptions } from "./cli";
