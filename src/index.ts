export * from './insight';
export { InsightService, type InsightServiceOptions } from './insightService';
