/**
 * Byte stream primitives used when a plan fragment is shipped to a remote executor.
 *
 * Join properties only ever need single bytes; the host protocol supplies its own
 * buffers by implementing these two interfaces.
 */

import { WireFormatError } from '../common/errors.js';

export interface WriteBuffer {
	writeUint8(value: number): void;
}

export interface ReadBuffer {
	/** Reads one byte. `fieldName` names what is being read, for error reporting. */
	readUint8(fieldName: string): number;
}

const INITIAL_CAPACITY = 16;

/** Growable in-memory WriteBuffer. */
export class ByteWriter implements WriteBuffer {
	private bytes = new Uint8Array(INITIAL_CAPACITY);
	private length = 0;

	writeUint8(value: number): void {
		if (!Number.isInteger(value) || value < 0 || value > 0xff) {
			throw new RangeError(`Not a byte: ${value}`);
		}
		if (this.length === this.bytes.length) {
			const grown = new Uint8Array(this.bytes.length * 2);
			grown.set(this.bytes);
			this.bytes = grown;
		}
		this.bytes[this.length++] = value;
	}

	get size(): number {
		return this.length;
	}

	/** Copy of the bytes written so far. */
	toBytes(): Uint8Array {
		return this.bytes.slice(0, this.length);
	}
}

/** ReadBuffer over a fixed byte array. */
export class ByteReader implements ReadBuffer {
	private offset = 0;

	constructor(private readonly bytes: Uint8Array) {}

	readUint8(fieldName: string): number {
		if (this.offset >= this.bytes.length) {
			throw new WireFormatError(fieldName);
		}
		return this.bytes[this.offset++];
	}

	get remaining(): number {
		return this.bytes.length - this.offset;
	}
}
