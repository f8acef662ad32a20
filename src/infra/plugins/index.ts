export { registerCors, buildCorsPolicy, isOriginAllowed, type CorsPolicy } from './cors.js';
