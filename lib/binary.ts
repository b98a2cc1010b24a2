import { RuleContractError } from './utils'

export type BinaryLayout<T> = Readonly<{
	name: string,
	width: number,
	decode(input: ArrayLike<number>, offset: number): T,
	encode(value: T): number[],
}>

function layout<T>(
	name: string,
	width: number,
	get: (view: DataView) => T,
	set: (view: DataView, value: T) => void,
): BinaryLayout<T> {
	return Object.freeze({
		name, width,
		decode(input: ArrayLike<number>, offset: number) {
			if (offset < 0 || offset + width > input.length)
				throw new RuleContractError([`${name} needs ${width} bytes at offset ${offset}, input has ${input.length}`])

			const bytes = new Uint8Array(width)
			for (let index = 0; index < width; index++)
				bytes[index] = input[offset + index]
			return get(new DataView(bytes.buffer))
		},
		encode(value: T) {
			const bytes = new Uint8Array(width)
			set(new DataView(bytes.buffer), value)
			return Array.from(bytes)
		},
	})
}

export const u8 = layout<number>('u8', 1, v => v.getUint8(0), (v, n) => v.setUint8(0, n))
export const i8 = layout<number>('i8', 1, v => v.getInt8(0), (v, n) => v.setInt8(0, n))

export const u16le = layout<number>('u16le', 2, v => v.getUint16(0, true), (v, n) => v.setUint16(0, n, true))
export const u16be = layout<number>('u16be', 2, v => v.getUint16(0, false), (v, n) => v.setUint16(0, n, false))
export const i16le = layout<number>('i16le', 2, v => v.getInt16(0, true), (v, n) => v.setInt16(0, n, true))
export const i16be = layout<number>('i16be', 2, v => v.getInt16(0, false), (v, n) => v.setInt16(0, n, false))

export const u32le = layout<number>('u32le', 4, v => v.getUint32(0, true), (v, n) => v.setUint32(0, n, true))
export const u32be = layout<number>('u32be', 4, v => v.getUint32(0, false), (v, n) => v.setUint32(0, n, false))
export const i32le = layout<number>('i32le', 4, v => v.getInt32(0, true), (v, n) => v.setInt32(0, n, true))
export const i32be = layout<number>('i32be', 4, v => v.getInt32(0, false), (v, n) => v.setInt32(0, n, false))

export const f32le = layout<number>('f32le', 4, v => v.getFloat32(0, true), (v, n) => v.setFloat32(0, n, true))
export const f32be = layout<number>('f32be', 4, v => v.getFloat32(0, false), (v, n) => v.setFloat32(0, n, false))
export const f64le = layout<number>('f64le', 8, v => v.getFloat64(0, true), (v, n) => v.setFloat64(0, n, true))
export const f64be = layout<number>('f64be', 8, v => v.getFloat64(0, false), (v, n) => v.setFloat64(0, n, false))

export const u64le = layout<bigint>('u64le', 8, v => v.getBigUint64(0, true), (v, n) => v.setBigUint64(0, n, true))
export const u64be = layout<bigint>('u64be', 8, v => v.getBigUint64(0, false), (v, n) => v.setBigUint64(0, n, false))
export const i64le = layout<bigint>('i64le', 8, v => v.getBigInt64(0, true), (v, n) => v.setBigInt64(0, n, true))
export const i64be = layout<bigint>('i64be', 8, v => v.getBigInt64(0, false), (v, n) => v.setBigInt64(0, n, false))
