import test, { asyncMonad, monad } from "arrange-act-assert";

import { assertDeepEqual, assertEqual, newInput, newOutput } from "./testUtils";
import { main, parseCliOptions, run } from "./cli";

test.describe("cli", test => {
    test.describe("parseCliOptions", test => {
        test("should return defaults without arguments", {
            ARRANGE() {
                return [];
            },
            ACT(argv) {
                return parseCliOptions(argv);
            },
            ASSERT(options) {
                assertDeepEqual(options, {
                    capacity: null,
                    duplicateOwners: false,
                    verify: false
                });
            }
        });
        test("should parse every option", {
            ARRANGE() {
                return ["--capacity", "256", "--allow-duplicate-owners", "--verify"];
            },
            ACT(argv) {
                return parseCliOptions(argv);
            },
            ASSERT(options) {
                assertDeepEqual(options, {
                    capacity: 256,
                    duplicateOwners: true,
                    verify: true
                });
            }
        });
        test("should error on an invalid capacity", {
            ARRANGE() {
                return ["--capacity", "abc"];
            },
            ACT(argv) {
                return monad(() => parseCliOptions(argv));
            },
            ASSERT(res) {
                res.should.error({
                    message: "Invalid memory size \"abc\""
                });
            }
        });
    });
    test.describe("run", test => {
        test("should ask for the memory size and stop on exit", {
            ARRANGE() {
                return {
                    input: newInput(["100", "RQ A 10 F", "STAT", "X", "STAT"]),
                    output: newOutput()
                };
            },
            async ACT({ input, output }) {
                await run({
                    capacity: null,
                    duplicateOwners: false,
                    verify: true
                }, {
                    input: input,
                    write: output.write
                });
            },
            ASSERT(_, { output }) {
                assertEqual(output.text, [
                    "Enter total memory size: allocator> Successfully allocated 10 bytes to A",
                    "allocator> Addresses [0:9] (10) Process A",
                    "Addresses [10:99] (90) Unused",
                    "allocator> "
                ].join("\n"));
            }
        });
        test("should use the given memory size and stop at the end of the input", {
            ARRANGE() {
                return {
                    input: newInput(["RQ A 10 F", "RQ B 60 F"]),
                    output: newOutput()
                };
            },
            async ACT({ input, output }) {
                await run({
                    capacity: 64,
                    duplicateOwners: false,
                    verify: true
                }, {
                    input: input,
                    write: output.write
                });
            },
            ASSERT(_, { output }) {
                assertEqual(output.text, [
                    "allocator> Successfully allocated 10 bytes to A",
                    "allocator> Error: Cannot allocate 60 bytes to B",
                    "allocator> "
                ].join("\n"));
            }
        });
        test("should error on an invalid memory size", {
            ARRANGE() {
                return {
                    input: newInput(["lots"]),
                    output: newOutput()
                };
            },
            ACT({ input, output }) {
                return asyncMonad(() => run({
                    capacity: null,
                    duplicateOwners: false,
                    verify: false
                }, {
                    input: input,
                    write: output.write
                }));
            },
            ASSERT(res) {
                res.should.error({
                    message: "Invalid memory size \"lots\""
                });
            }
        });
        test("should error when the input ends before the memory size", {
            ARRANGE() {
                return {
                    input: newInput([]),
                    output: newOutput()
                };
            },
            ACT({ input, output }) {
                return asyncMonad(() => run({
                    capacity: null,
                    duplicateOwners: false,
                    verify: false
                }, {
                    input: input,
                    write: output.write
                }));
            },
            ASSERT(res) {
                res.should.error({
                    message: "Memory size not provided"
                });
            }
        });
    });
    test.describe("main", test => {
        test("should pass the options to the shell", {
            ARRANGE() {
                return {
                    input: newInput(["RQ A 5 F", "RQ A 5 F", "X"]),
                    output: newOutput()
                };
            },
            async ACT({ input, output }) {
                await main(["--capacity", "20", "--allow-duplicate-owners"], {
                    input: input,
                    write: output.write
                });
            },
            ASSERT(_, { output }) {
                assertEqual(output.text, [
                    "allocator> Successfully allocated 5 bytes to A",
                    "allocator> Successfully allocated 5 bytes to A",
                    "allocator> "
                ].join("\n"));
            }
        });
    });
});
