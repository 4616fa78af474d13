export {
  distinctEntities,
  topKeywords,
  distinctContacts,
  compareActionItems,
  buildStatistics,
} from './aggregations';
