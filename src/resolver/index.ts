export { Resolver, resolve } from './resolver.js';
