export const enum Strategy {
    FIRST_FIT = "F",
    BEST_FIT = "B",
    WORST_FIT = "W"
}
export const enum AllocateError {
    NO_SPACE = "NO_SPACE",
    OWNER_ACTIVE = "OWNER_ACTIVE",
    INVALID_STRATEGY = "INVALID_STRATEGY"
}
export const enum Prompts {
    CAPACITY = "Enter total memory size: ",
    COMMAND = "allocator> "
}
export const enum Commands {
    REQUEST = "RQ",
    RELEASE = "RL",
    COMPACT = "C",
    STATUS = "STAT",
    EXIT = "X"
}
