import { resolveOptions } from '../../src/config/OptionResolver';

// TypeScript-only acceptance checks for chart option resolution.

const resolvedMargin = resolveOptions({ innerMargin: 12 });
if (resolvedMargin.innerMargin !== 12) {
  throw new Error('Expected innerMargin to be overridden by user options.');
}
if (resolvedMargin.yAxis.gridCount !== 10) {
  throw new Error('Expected yAxis.gridCount to fall back to defaults.');
}

const resolvedLabels = resolveOptions({ xAxis: { labels: ['Mon', 'Tue'] } });
if (resolvedLabels.xAxis.labels.length !== 2) {
  throw new Error('Expected xAxis.labels to be preserved.');
}

const resolvedInterpolation = resolveOptions({ interpolation: 'legacy' });
if (resolvedInterpolation.interpolation !== 'legacy') {
  throw new Error('Expected interpolation to resolve to legacy.');
}
