export { makeDbHealthChecker, type DbHealthCheckerOptions } from './db-checker.js';
export { makeGeoReferenceHealthChecker } from './geo-checker.js';
