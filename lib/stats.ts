export function sum(nums: number[]): number {
  return nums.reduce((a, b) => a + b, 0)
}

export function mean(nums: number[]): number {
  if (nums.length === 0) return NaN
  return sum(nums) / nums.length
}

/** 표본 표준편차 (ddof = 1) */
export function std(nums: number[]): number {
  if (nums.length < 2) return NaN
  const m = mean(nums)
  const variance = nums.reduce((acc, n) => acc + (n - m) ** 2, 0) / (nums.length - 1)
  return Math.sqrt(variance)
}

/** 선형 보간 분위수. q는 0~1 */
export function quantile(nums: number[], q: number): number {
  if (nums.length === 0) return NaN
  const sorted = [...nums].sort((a, b) => a - b)
  const pos = (sorted.length - 1) * q
  const lower = Math.floor(pos)
  const upper = Math.ceil(pos)
  if (lower === upper) return sorted[lower]
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (pos - lower)
}

export function median(nums: number[]): number {
  return quantile(nums, 0.5)
}

export function min(nums: number[]): number {
  return nums.length === 0 ? NaN : nums.reduce((a, b) => (b < a ? b : a))
}

export function max(nums: number[]): number {
  return nums.length === 0 ? NaN : nums.reduce((a, b) => (b > a ? b : a))
}

export function pearson(xs: number[], ys: number[]): number {
  const n = Math.min(xs.length, ys.length)
  if (n < 2) return NaN
  const mx = mean(xs.slice(0, n))
  const my = mean(ys.slice(0, n))
  let cov = 0
  let vx = 0
  let vy = 0
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx
    const dy = ys[i] - my
    cov += dx * dy
    vx += dx * dx
    vy += dy * dy
  }
  if (vx === 0 || vy === 0) return NaN
  return cov / Math.sqrt(vx * vy)
}

export interface HistogramBin {
  start: number
  end: number
  count: number
}

/** 등폭 구간. 마지막 구간은 닫힌 구간, 상수 컬럼은 [v - 0.5, v + 0.5] */
export function histogram(nums: number[], bins: number): HistogramBin[] {
  if (nums.length === 0 || bins <= 0) return []

  let lo = min(nums)
  let hi = max(nums)
  if (lo === hi) {
    lo -= 0.5
    hi += 0.5
  }

  const width = (hi - lo) / bins
  const result: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    start: lo + i * width,
    end: i === bins - 1 ? hi : lo + (i + 1) * width,
    count: 0,
  }))

  for (const n of nums) {
    let idx = Math.floor((n - lo) / width)
    if (idx >= bins) idx = bins - 1
    if (idx < 0) idx = 0
    result[idx].count++
  }
  return result
}

export interface BoxStats {
  q1: number
  median: number
  q3: number
  lowerWhisker: number
  upperWhisker: number
  outliers: number[]
}

/** 수염은 1.5 × IQR 범위 안의 가장 먼 관측값 */
export function boxStats(nums: number[]): BoxStats {
  const q1 = quantile(nums, 0.25)
  const q3 = quantile(nums, 0.75)
  const iqr = q3 - q1
  const lowFence = q1 - 1.5 * iqr
  const highFence = q3 + 1.5 * iqr
  const inside = nums.filter(n => n >= lowFence && n <= highFence)

  return {
    q1,
    median: median(nums),
    q3,
    lowerWhisker: inside.length > 0 ? min(inside) : q1,
    upperWhisker: inside.length > 0 ? max(inside) : q3,
    outliers: nums.filter(n => n < lowFence || n > highFence).sort((a, b) => a - b),
  }
}
