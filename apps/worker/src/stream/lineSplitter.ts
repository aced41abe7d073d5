/**
 * Reassembles newline-delimited text from arbitrary chunk boundaries.
 *
 * Bytes are decoded with a streaming TextDecoder so a multi-byte character
 * split across two chunks is decoded once both halves arrive.
 */
export class LineSplitter {
    private readonly decoder = new TextDecoder("utf-8");
    private pending = "";

    push(chunk: Uint8Array | string): string[] {
        this.pending += typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });

        const lines: string[] = [];
        let newline = this.pending.indexOf("\n");
        while (newline !== -1) {
            const line = stripCarriageReturn(this.pending.slice(0, newline));
            if (line.trim().length > 0) {
                lines.push(line);
            }
            this.pending = this.pending.slice(newline + 1);
            newline = this.pending.indexOf("\n");
        }
        return lines;
    }

    /** Remaining partial line at end of stream, if any. */
    flush(): string | null {
        const rest = stripCarriageReturn(this.pending + this.decoder.decode());
        this.pending = "";
        return rest.trim().length > 0 ? rest : null;
    }
}

function stripCarriageReturn(line: string): string {
    return line.endsWith("\r") ? line.slice(0, -1) : line;
}
