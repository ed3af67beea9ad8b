export { RequestContext, type RequestContextData } from './RequestContext.js';
