import { LinearScale } from '../../src/utils/scales';
import { enumerateTicks } from '../../src/core/axis/computeAxisTicks';
import { findColumnAtX } from '../../src/interaction/findColumnAtX';

// TypeScript-only acceptance checks for the scale consumer contract:
// one scale per axis, forward mapping per point, invert for hit-testing.

const sample = [100, 250, 407, 300, 180];

const x = new LinearScale([0, sample.length - 1], [0, 300]);
const toPixel = x.scale();
if (toPixel(0) !== 0 || toPixel(sample.length - 1) !== 300) {
  throw new Error('Expected the x scale to span the full plot width.');
}

const column = findColumnAtX(160, x.invert(), sample.length);
if (column !== 2) {
  throw new Error(`Expected pixel 160 to resolve to column 2, got ${String(column)}.`);
}

const y = new LinearScale([100, 407], [0, 200]);
const yTicks = enumerateTicks(y.ticks(5));
if (yTicks[0] !== 100 || yTicks[yTicks.length - 1] !== 400) {
  throw new Error('Expected value ticks from 100 to 400.');
}
