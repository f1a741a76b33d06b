export {
  QUARTERS,
  isQuarter,
  comparePeriods,
  periodsEqual,
  nextPeriod,
  formatPeriod,
  parsePeriodLabel,
} from './periods.js';
