import * as fs from 'node:fs';
import { StructuralFormatError } from './errors.js';

/**
 * Read-only, random-access view of a file held by a descriptor.
 *
 * Every read is exact: asking for bytes past the end of the file throws
 * StructuralFormatError instead of returning a short buffer.
 */
export class BinaryFile {
    private fd: number | null;

    private constructor(public readonly path: string, fd: number, public readonly size: number) {
        this.fd = fd;
    }

    static open(path: string): BinaryFile {
        let fd: number;
        try {
            fd = fs.openSync(path, 'r');
        } catch (e) {
            throw new StructuralFormatError(`Cannot open ${path}`, path, e);
        }
        try {
            return new BinaryFile(path, fd, fs.fstatSync(fd).size);
        } catch (e) {
            fs.closeSync(fd);
            throw new StructuralFormatError(`Cannot stat ${path}`, path, e);
        }
    }

    /** Returns null when nothing regular exists at `path`. */
    static openIfPresent(path: string): BinaryFile | null {
        if (!isFile(path)) return null;
        return BinaryFile.open(path);
    }

    /**
     * Opens `path`, runs `fn`, and closes the descriptor on every exit path.
     */
    static with<T>(path: string, fn: (file: BinaryFile) => T): T {
        const file = BinaryFile.open(path);
        try {
            return fn(file);
        } finally {
            file.close();
        }
    }

    get isOpen(): boolean {
        return this.fd !== null;
    }

    readAt(position: number, length: number): Uint8Array {
        if (this.fd === null) {
            throw new StructuralFormatError(`${this.path} is closed`, this.path);
        }
        if (position < 0 || position + length > this.size) {
            throw new StructuralFormatError(
                `Read of ${length} bytes at offset ${position} runs past end of ${this.path} (${this.size} bytes)`,
                this.path
            );
        }
        const buffer = new Uint8Array(length);
        let done = 0;
        while (done < length) {
            const n = fs.readSync(this.fd, buffer, done, length - done, position + done);
            if (n === 0) {
                throw new StructuralFormatError(`Unexpected end of ${this.path} at offset ${position + done}`, this.path);
            }
            done += n;
        }
        return buffer;
    }

    readUint16At(position: number): number {
        const bytes = this.readAt(position, 2);
        return bytes[0] | (bytes[1] << 8);
    }

    close(): void {
        if (this.fd !== null) {
            fs.closeSync(this.fd);
            this.fd = null;
        }
    }
}

export function isFile(path: string): boolean {
    try {
        return fs.statSync(path).isFile();
    } catch {
        return false;
    }
}
