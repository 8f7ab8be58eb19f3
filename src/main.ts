#!/usr/bin/env node
import { main } from "./cli";

main(process.argv.slice(2), {
    input: process.stdin,
    write(text) {
        process.stdout.write(text);
    }
}).catch((e:unknown) => {
    console.error(e);
    process.exitCode = 1;
});
