export { formatSize } from './format';
export { JsonReporter } from './json-reporter';
export { TableReporter, describeFailure } from './table-reporter';
