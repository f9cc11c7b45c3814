import { describe, expect, it, vi } from "vitest"
import { CoordinateCodec } from "../src/coordinate-codec"
import { InvalidConfigurationError, MalformedCoordinatesError } from "../src/errors"

describe("coordinate codec", () => {
	describe("encode", () => {
		it("rounds to the configured decimal places", () => {
			const coordinate = { x: 1.123456789, y: 2.0 }
			expect(new CoordinateCodec(2).encode(coordinate)).toEqual([1.12, 2])
			expect(new CoordinateCodec(0).encode(coordinate)).toEqual([1, 2])
		})

		it("keeps eight decimal places by default", () => {
			expect(new CoordinateCodec().encode({ x: 1.123456789, y: -0.5 })).toEqual([
				1.12345679, -0.5,
			])
		})

		it("rounds ties away from zero", () => {
			const codec = new CoordinateCodec(2)
			expect(codec.format(0.125)).toBe(0.13)
			expect(codec.format(-0.125)).toBe(-0.13)
			expect(new CoordinateCodec(0).format(2.5)).toBe(3)
			expect(new CoordinateCodec(0).format(-2.5)).toBe(-3)
		})

		it("writes z only when it is finite", () => {
			const codec = new CoordinateCodec()
			expect(codec.encode({ x: 1, y: 2, z: Number.NaN })).toEqual([1, 2])
			expect(codec.encode({ x: 1, y: 2, z: Number.NEGATIVE_INFINITY })).toEqual([
				1, 2,
			])
			expect(codec.encode({ x: 1, y: 2, z: 3.5 })).toEqual([1, 2, 3.5])
		})
	})

	describe("configuration", () => {
		it("rejects negative decimal places", () => {
			expect(() => new CoordinateCodec(-1)).toThrow(InvalidConfigurationError)
			expect(() => new CoordinateCodec(-1)).toThrow("decimalPlaces < 0")
		})

		it("rejects fractional and oversized decimal places", () => {
			expect(() => new CoordinateCodec(1.5)).toThrow(
				"decimalPlaces must be an integer, got 1.5",
			)
			expect(() => new CoordinateCodec(101)).toThrow("decimalPlaces > 100")
			expect(new CoordinateCodec(100).decimalPlaces).toBe(100)
		})
	})

	describe("decode", () => {
		const codec = new CoordinateCodec()

		it("reads 2D and 3D positions", () => {
			expect(codec.decode([1, 2])).toEqual({ x: 1, y: 2 })
			expect(codec.decode([1, 2, 3])).toEqual({ x: 1, y: 2, z: 3 })
		})

		it("drops ordinates past z with a warning", () => {
			const log = vi.fn()
			const coordinate = new CoordinateCodec(8, log).decode([1, 2, 3, 4, 5])
			expect(coordinate).toEqual({ x: 1, y: 2, z: 3 })
			expect(log).toHaveBeenCalledOnce()
			expect(log).toHaveBeenCalledWith("Dropping 2 ordinate(s) beyond Z")
		})

		it("reads the object form", () => {
			expect(codec.decode({ x: 1, y: 2 })).toEqual({ x: 1, y: 2 })
			expect(codec.decode({ x: 1, y: 2, z: null })).toEqual({ x: 1, y: 2 })
			expect(codec.decode({ x: 1, y: 2, z: 3 })).toEqual({ x: 1, y: 2, z: 3 })
		})

		it("rejects fewer than two ordinates", () => {
			expect(() => codec.decode([1])).toThrow(MalformedCoordinatesError)
			expect(() => codec.decode([])).toThrow("Invalid number of ordinates: 0")
		})

		it("names the node kind of a non-numeric ordinate", () => {
			expect(() => codec.decode([[1, 2], [3, 4]])).toThrow(
				"Invalid coordinates, expecting numbers but got: ARRAY",
			)
			expect(() => codec.decode(["1", 2])).toThrow(
				"Invalid coordinates, expecting numbers but got: STRING",
			)
			expect(() => codec.decode([1, null])).toThrow(
				"Invalid coordinates, expecting numbers but got: NULL",
			)
			expect(() => codec.decode([1, 2, true])).toThrow(
				"Invalid coordinates, expecting numbers but got: BOOLEAN",
			)
			expect(() => codec.decode({ x: 1 })).toThrow(
				"Invalid coordinates, expecting numbers but got: MISSING",
			)
			expect(() => codec.decode({ x: 1, y: { value: 2 } })).toThrow(
				"Invalid coordinates, expecting numbers but got: OBJECT",
			)
		})

		it("rejects anything but an array or an object", () => {
			expect(() => codec.decode("1,2")).toThrow(
				'Unknown coordinates format: "1,2"',
			)
			expect(() => codec.decode(5)).toThrow("Unknown coordinates format: 5")
			expect(() => codec.decode(null)).toThrow(
				"Unknown coordinates format: null",
			)
		})
	})
})
