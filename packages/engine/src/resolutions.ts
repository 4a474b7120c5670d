import type { Resolution, ResolutionSettings } from '@texbake/types'

export interface ResolutionExpansion {
  resolutions: Resolution[]
  /** Multi-resolution was on but nothing was selected; the base size was used. */
  fallback: boolean
}

function area(r: Resolution): number {
  return r.width * r.height
}

/** Ascending by area, ties by width. */
export function compareResolutions(a: Resolution, b: Resolution): number {
  return area(a) - area(b) || a.width - b.width
}

/**
 * Resolutions to bake, smallest first. Expects validated settings.
 * Standard sizes come first and custom slots second before sorting, so the
 * first occurrence of a size wins deduplication.
 */
export function expandResolutions(settings: ResolutionSettings): ResolutionExpansion {
  const base: Resolution = { width: settings.base, height: settings.base }
  if (!settings.multiResolution) return { resolutions: [base], fallback: false }

  const candidates: Resolution[] = settings.standard.map((size) => ({ width: size, height: size }))
  if (settings.customEnabled) {
    for (const slot of settings.custom) {
      if (slot.enabled) candidates.push({ width: slot.width, height: slot.height })
    }
  }

  // Sizes repeated across standard and custom slots collapse to one resolution; this is not an output collision.
  const seen = new Set<string>()
  const unique: Resolution[] = []
  for (const r of candidates) {
    const key = `${r.width}x${r.height}`
    if (seen.has(key)) continue
    seen.add(key)
    unique.push(r)
  }

  if (unique.length === 0) return { resolutions: [base], fallback: true }
  return { resolutions: unique.sort(compareResolutions), fallback: false }
}

/** The largest resolution of a set, by area. */
export function primaryResolution(resolutions: readonly Resolution[]): Resolution | undefined {
  let best: Resolution | undefined
  for (const r of resolutions) {
    if (best === undefined || compareResolutions(r, best) > 0) best = r
  }
  return best
}
