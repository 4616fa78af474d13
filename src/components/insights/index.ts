export { StatisticsCards } from './StatisticsCards';
