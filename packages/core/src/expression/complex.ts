/**
 * Complex arithmetic over IEEE doubles.
 *
 * Operations whose result is undefined (division by zero, zero raised to a
 * non-positive power) return null instead of Infinity or NaN, so callers decide
 * whether that is an error or a term to keep symbolic.
 */

export interface Complex {
	readonly re: number
	readonly im: number
}

export function complex(re: number, im = 0): Complex {
	return { im, re }
}

export const ZERO: Complex = Object.freeze(complex(0))
export const ONE: Complex = Object.freeze(complex(1))
export const I: Complex = Object.freeze(complex(0, 1))

export function isZero(z: Complex): boolean {
	return z.re === 0 && z.im === 0
}

export function isReal(z: Complex): boolean {
	return z.im === 0
}

export function isFiniteComplex(z: Complex): boolean {
	return Number.isFinite(z.re) && Number.isFinite(z.im)
}

export function equals(a: Complex, b: Complex): boolean {
	return a.re === b.re && a.im === b.im
}

export function negate(z: Complex): Complex {
	return complex(z.re === 0 ? 0 : -z.re, z.im === 0 ? 0 : -z.im)
}

export function add(a: Complex, b: Complex): Complex {
	return complex(a.re + b.re, a.im + b.im)
}

export function subtract(a: Complex, b: Complex): Complex {
	return complex(a.re - b.re, a.im - b.im)
}

export function multiply(a: Complex, b: Complex): Complex {
	if (a.im === 0 && b.im === 0) return complex(a.re * b.re)
	return complex(a.re * b.re - a.im * b.im, a.re * b.im + a.im * b.re)
}

export function divide(a: Complex, b: Complex): Complex | null {
	if (isZero(b)) return null
	if (a.im === 0 && b.im === 0) return complex(a.re / b.re)
	const denominator = b.re * b.re + b.im * b.im
	return complex(
		(a.re * b.re + a.im * b.im) / denominator,
		(a.im * b.re - a.re * b.im) / denominator
	)
}

/** Principal natural logarithm; undefined at zero. */
export function log(z: Complex): Complex | null {
	if (isZero(z)) return null
	return complex(Math.log(Math.hypot(z.re, z.im)), Math.atan2(z.im, z.re))
}

export function exp(z: Complex): Complex {
	const magnitude = Math.exp(z.re)
	if (z.im === 0) return complex(magnitude)
	return complex(magnitude * Math.cos(z.im), magnitude * Math.sin(z.im))
}

export function power(base: Complex, exponent: Complex): Complex | null {
	if (isZero(base)) {
		if (isZero(exponent)) return ONE
		return exponent.re > 0 ? ZERO : null
	}
	if (isReal(base) && isReal(exponent) && (base.re > 0 || Number.isInteger(exponent.re))) {
		return complex(base.re ** exponent.re)
	}
	const logarithm = log(base)
	return logarithm === null ? null : exp(multiply(exponent, logarithm))
}

export function sin(z: Complex): Complex {
	if (z.im === 0) return complex(Math.sin(z.re))
	return complex(Math.sin(z.re) * Math.cosh(z.im), Math.cos(z.re) * Math.sinh(z.im))
}

export function cos(z: Complex): Complex {
	if (z.im === 0) return complex(Math.cos(z.re))
	return complex(Math.cos(z.re) * Math.cosh(z.im), -Math.sin(z.re) * Math.sinh(z.im))
}

/** Principal square root; negative reals give a purely imaginary result. */
export function sqrt(z: Complex): Complex {
	if (z.im === 0) {
		return z.re >= 0 ? complex(Math.sqrt(z.re)) : complex(0, Math.sqrt(-z.re))
	}
	const modulus = Math.hypot(z.re, z.im)
	const re = Math.sqrt((modulus + z.re) / 2)
	const im = Math.sign(z.im) * Math.sqrt((modulus - z.re) / 2)
	return complex(re, im)
}

/** cos(z) + i·sin(z) */
export function cis(z: Complex): Complex {
	return add(cos(z), multiply(I, sin(z)))
}
