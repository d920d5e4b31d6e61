export type Vec3 = readonly [number, number, number]

export type Mat3 = readonly [Vec3, Vec3, Vec3]

export function subtract(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]]
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2]
}

export function norm(v: Vec3): number {
  return Math.sqrt(dot(v, v))
}

export function multiply(m: Mat3, v: Vec3): Vec3 {
  return [dot(m[0], v), dot(m[1], v), dot(m[2], v)]
}
