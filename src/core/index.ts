/**
 * Core module - shared types and configuration loading
 */

export * from './types'
export * from './config'
