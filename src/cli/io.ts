import fs from "fs/promises";

/** Read a whole stream (stdin by default) as UTF-8 text. */
export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
    }
    return Buffer.concat(chunks).toString("utf-8");
}

/** `-` reads stdin; anything else is a file path. */
export async function readInput(input: string): Promise<string> {
    if (input === "-") return readStdin();
    return fs.readFile(input, "utf-8");
}
