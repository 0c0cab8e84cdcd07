export * from './cache';
export * from './config';
export * from './conjugator';
export * from './grammar';
export * from './provider';
export * from './reporting';
export { CONJUGATION_NAMESPACE, createApp } from './app';
export type { App, AppOptions } from './app';
export { ConsoleLogger, getLogger, resetLogger, setLogger } from './logging';
export type { Logger, ConsoleLoggerOptions } from './logging';
