export { DEFAULT_INTERCEPTOR_TIMEOUT_MS, InterceptorChain, type InterceptorChainOptions } from './chain';
export { createMethodFilterInterceptor, type MethodFilterOptions } from './method-filter';
export {
  type ChainOutcome,
  defineInterceptor,
  Intercept,
  type InterceptAction,
  type InterceptContext,
  type Interceptor
} from './types';
