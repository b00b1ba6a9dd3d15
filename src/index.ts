export * from './stats/index.ts'
export { debug, debugEnabled } from './log.ts'
