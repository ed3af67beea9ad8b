export * from './LocaleResolver.js';
