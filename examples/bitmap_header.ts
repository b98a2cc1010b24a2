import { Ok, Err } from '@ts-std/monads'
import type { Result } from '@ts-std/monads'

import {
	seq, bin_bytes, read, read_sequence, advance, expecting, parse, ref_of, Diagnostics,
	u8, u16le, u32le, i32le,
} from '../lib'
import type { ParseFailure } from '../lib'

export type BitmapHeader = {
	file_size: number,
	width: number,
	height: number,
	bits_per_pixel: number,
	pixels: number[],
}

// signature, file header, and the fixed part of the info header
const FIXED_WIDTH = 30

export function read_bitmap(bytes: ArrayLike<number>): Result<BitmapHeader, ParseFailure> {
	const diagnostics = new Diagnostics()
	const file_size = ref_of(0)
	const reserved = ref_of(0)
	const data_offset = ref_of(0)
	const info_size = ref_of(0)
	const width = ref_of(0)
	const height = ref_of(0)
	const planes = ref_of(0)
	const bits_per_pixel = ref_of(0)
	const pixels = [] as number[]

	const bitmap = seq(
		expecting(bin_bytes([0x42, 0x4d]), 'expected bitmap signature', diagnostics),
		read(u32le, file_size),
		read(u32le, reserved),
		read(u32le, data_offset),
		read(u32le, info_size),
		read(i32le, width),
		read(i32le, height),
		read(u16le, planes),
		read(u16le, bits_per_pixel),
		expecting(advance(() => Math.max(data_offset.value - FIXED_WIDTH, 0)), 'pixel data offset is past the end', diagnostics),
		read_sequence(u8, pixels),
	)

	return parse(bitmap, bytes, { diagnostics }).match({
		ok: (): Result<BitmapHeader, ParseFailure> => Ok({
			file_size: file_size.value,
			width: width.value,
			height: height.value,
			bits_per_pixel: bits_per_pixel.value,
			pixels,
		}),
		err: (failure): Result<BitmapHeader, ParseFailure> => Err(failure),
	})
}
