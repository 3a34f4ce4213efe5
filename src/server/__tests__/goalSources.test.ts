import { describe, expect, it, vi } from 'vitest'

import { createPose } from '../../lib/pose'
import { cycleGoals, randomGoals, routeModes } from '../goalSources'

import { createFakeLogger, createGrid } from './helpers'

const a = createPose('map', 1, 0, 0, 0, 0, 0)
const b = createPose('map', 2, 0, 0, 0, 0, 0)
const c = createPose('map', 3, 0, 0, 0, 0, 0)

describe('goal sources', () => {
  it('cycles through poses in order', () => {
    const source = cycleGoals([a, b])
    expect([source.next(), source.next(), source.next()]).toEqual([a, b, a])
  })

  it('has nothing to give without poses', () => {
    expect(cycleGoals([]).next()).toBeNull()
    expect(randomGoals([], () => 0.5).next()).toBeNull()
  })

  it('picks a random configured pose', () => {
    expect(randomGoals([a, b, c], () => 0.7).next()).toBe(c)
    expect(randomGoals([a, b, c], () => 0).next()).toBe(a)
  })

  it('reads the map once for dynamic routing', async () => {
    const fetchMap = vi.fn(async () => createGrid({ width: 10, height: 10 }))
    const source = await routeModes.dynamic([], {
      fetchMap,
      random: () => 0.55,
      logger: createFakeLogger(),
    })

    expect(source.next()).toMatchObject({ x: 5, y: 5 })
    expect(source.next()).toMatchObject({ x: 5, y: 5 })
    expect(fetchMap).toHaveBeenCalledTimes(1)
  })
})
