export {
  calculateOptimalParams,
  estimateFalsePositiveRate,
  formatPlan,
  planFilter,
} from './FilterSizing';
