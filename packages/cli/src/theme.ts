import chalk, { type ChalkInstance } from 'chalk'
import type { StepOutcome } from '@rigger/kernel'

export interface Palette {
  readonly blue: ChalkInstance
  readonly blueBright: ChalkInstance
  readonly text: ChalkInstance
  readonly white: ChalkInstance
  readonly dim: ChalkInstance
  readonly muted: ChalkInstance
  readonly amber: ChalkInstance
  readonly green: ChalkInstance
  readonly red: ChalkInstance
}

export const createPalette = (c: ChalkInstance): Palette => ({
  blue:       c.hex('#4FC3F7'),
  blueBright: c.hex('#81D4FA'),
  text:       c.hex('#C8C8C0'),
  white:      c.hex('#F2F2EC'),
  dim:        c.hex('#444444'),
  muted:      c.hex('#666666'),
  amber:      c.hex('#D4880A'),
  green:      c.hex('#81C784'),
  red:        c.hex('#CF6679'),
})

export const t: Palette = createPalette(chalk)

export const outcomeColor = (outcome: StepOutcome, p: Palette = t): ChalkInstance => {
  switch (outcome) {
    case 'applied':
    case 'reverted':
    case 'valid':
      return p.green
    case 'skipped':
      return p.blue
    case 'invalid':
      return p.red
    case 'no-action':
      return p.muted
  }
}
