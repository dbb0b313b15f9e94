export { LineChartError } from './base';
export { InvalidArgumentError } from './invalid-argument';
