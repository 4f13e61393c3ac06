// Streaming P^2 estimator (Jain & Chlamtac, 1985) for one quantile q in (0,1).
// Keeps five markers instead of the samples.
export class P2Quantile {
  private readonly q: number
  private readonly heights: number[] = []
  private positions = [0, 1, 2, 3, 4]
  private desired: number[]
  private readonly increments: number[]
  private seen = 0

  constructor(q: number) {
    if (!(q > 0 && q < 1)) throw new Error(`quantile ${q} is outside (0, 1)`)
    this.q = q
    this.desired = [0, 2 * q, 4 * q, 2 + 2 * q, 4]
    this.increments = [0, q / 2, q, (1 + q) / 2, 1]
  }

  get count(): number {
    return this.seen
  }

  add(x: number): void {
    if (!Number.isFinite(x)) return
    this.seen++
    const h = this.heights
    if (h.length < 5) {
      h.push(x)
      if (h.length === 5) h.sort((a, b) => a - b)
      return
    }

    let cell: number
    if (x < h[0]) {
      h[0] = x
      cell = 0
    } else if (x >= h[4]) {
      h[4] = x
      cell = 3
    } else {
      cell = 0
      while (cell < 3 && x >= h[cell + 1]) cell++
    }

    for (let i = cell + 1; i < 5; i++) this.positions[i]++
    for (let i = 0; i < 5; i++) this.desired[i] += this.increments[i]

    for (let i = 1; i <= 3; i++) this.adjust(i)
  }

  get(): number {
    const h = this.heights
    if (h.length === 0) return NaN
    if (h.length < 5) {
      const sorted = [...h].sort((a, b) => a - b)
      return sorted[Math.floor(this.q * (sorted.length - 1))]
    }
    return h[2]
  }

  private adjust(i: number): void {
    const n = this.positions
    const d = this.desired[i] - n[i]
    const roomUp = n[i + 1] - n[i] > 1
    const roomDown = n[i - 1] - n[i] < -1
    if (!((d >= 1 && roomUp) || (d <= -1 && roomDown))) return
    const s = d > 0 ? 1 : -1
    const h = this.heights
    const candidate = this.parabolic(i, s)
    h[i] = h[i - 1] < candidate && candidate < h[i + 1] ? candidate : this.linear(i, s)
    n[i] += s
  }

  private parabolic(i: number, s: number): number {
    const h = this.heights
    const n = this.positions
    return h[i] + s / (n[i + 1] - n[i - 1]) * (
      (n[i] - n[i - 1] + s) * (h[i + 1] - h[i]) / (n[i + 1] - n[i]) +
      (n[i + 1] - n[i] - s) * (h[i] - h[i - 1]) / (n[i] - n[i - 1])
    )
  }

  private linear(i: number, s: number): number {
    const h = this.heights
    const n = this.positions
    return h[i] + s * (h[i + s] - h[i]) / (n[i + s] - n[i])
  }
}
