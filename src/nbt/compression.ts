/**
 * Compression framing around the raw NBT byte stream.
 * Reading detects the envelope from its magic bytes (gzip, then zlib, else
 * none); writing always uses the envelope the caller names.
 */

import { deflateSync, gunzipSync, gzipSync, inflateSync } from "node:zlib";
import { NbtError } from "./errors.ts";
import type { NbtCompression } from "./types.ts";

export const COMPRESSIONS: readonly NbtCompression[] = ["none", "gzip", "zlib"];

// ─── Detection ──────────────────────────────────────────────────────────────

export const hasGzipHeader = (data: Uint8Array): boolean =>
	data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;

/** CMF/FLG pair: deflate method, window <= 32K, header checksum divisible by 31. */
export const hasZlibHeader = (data: Uint8Array): boolean =>
	data.length >= 2 &&
	(data[0] & 0x0f) === 8 &&
	data[0] >> 4 <= 7 &&
	((data[0] << 8) | data[1]) % 31 === 0;

export const detectCompression = (data: Uint8Array): NbtCompression => {
	if (hasGzipHeader(data)) return "gzip";
	if (hasZlibHeader(data)) return "zlib";
	return "none";
};

export const isCompression = (value: string): value is NbtCompression =>
	COMPRESSIONS.some((c) => c === value);

/** Validate a caller-supplied mode name. */
export const parseCompression = (value: string): NbtCompression => {
	if (!isCompression(value))
		throw new NbtError(
			"UnsupportedCompression",
			`Unsupported compression "${value}" (expected ${COMPRESSIONS.join(", ")})`,
		);
	return value;
};

// ─── Wrap / unwrap ──────────────────────────────────────────────────────────

export const compress = (data: Buffer, compression: NbtCompression): Buffer => {
	switch (parseCompression(compression)) {
		case "none":
			return data;
		case "gzip":
			return gzipSync(data);
		case "zlib":
			return deflateSync(data);
	}
};

export const decompress = (
	data: Buffer,
): { readonly data: Buffer; readonly compression: NbtCompression } => {
	const compression = detectCompression(data);
	if (compression === "none") return { data, compression };
	try {
		return {
			data: compression === "gzip" ? gunzipSync(data) : inflateSync(data),
			compression,
		};
	} catch (err) {
		throw new NbtError(
			"DecompressionFailed",
			`Corrupt ${compression} stream`,
			{ offset: 0 },
			err,
		);
	}
};
