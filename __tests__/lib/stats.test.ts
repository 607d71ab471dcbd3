import { describe, it, expect } from 'vitest'
import { mean, std, quantile, median, min, max, pearson, histogram, boxStats } from '@/lib/stats'

describe('summary statistics', () => {
  it('should compute mean, median and extremes', () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5)
    expect(median([5, 1, 3])).toBe(3)
    expect(min([4, -2, 9])).toBe(-2)
    expect(max([4, -2, 9])).toBe(9)
  })

  it('should return NaN for empty input', () => {
    expect(mean([])).toBeNaN()
    expect(min([])).toBeNaN()
    expect(quantile([], 0.5)).toBeNaN()
  })

  it('should compute the sample standard deviation', () => {
    expect(std([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.13809, 5)
    expect(std([1])).toBeNaN()
  })

  it('should interpolate quantiles linearly', () => {
    expect(quantile([1, 2, 3, 4], 0.25)).toBe(1.75)
    expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5)
  })
})

describe('pearson', () => {
  it('should detect perfect correlation', () => {
    expect(pearson([1, 2, 3], [2, 4, 6])).toBeCloseTo(1)
    expect(pearson([1, 2, 3], [3, 2, 1])).toBeCloseTo(-1)
  })

  it('should return NaN for constant input', () => {
    expect(pearson([1, 1, 1], [1, 2, 3])).toBeNaN()
  })
})

describe('histogram', () => {
  it('should place the maximum in the last bin', () => {
    const bins = histogram([25, 28, 30, 35, 40], 3)
    expect(bins.map(b => b.count)).toEqual([2, 1, 2])
    expect(bins.map(b => [b.start, b.end])).toEqual([[25, 30], [30, 35], [35, 40]])
  })

  it('should widen a constant column', () => {
    const bins = histogram([3, 3], 2)
    expect(bins).toEqual([
      { start: 2.5, end: 3, count: 0 },
      { start: 3, end: 3.5, count: 2 },
    ])
  })

  it('should return no bins for empty input', () => {
    expect(histogram([], 10)).toEqual([])
  })
})

describe('boxStats', () => {
  it('should find outliers beyond 1.5 × IQR', () => {
    expect(boxStats([1, 2, 3, 4, 100])).toEqual({
      q1: 2,
      median: 3,
      q3: 4,
      lowerWhisker: 1,
      upperWhisker: 4,
      outliers: [100],
    })
  })
})
