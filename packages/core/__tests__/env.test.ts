import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { createEnvSchema, loadBaseEnv, loadEnvVariables } from '../src/env'

describe('Environment loading', () => {
  it('should apply the base defaults', () => {
    expect(loadBaseEnv({ source: {} })).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
    })
  })

  it('should keep valid values', () => {
    expect(
      loadBaseEnv({ source: { NODE_ENV: 'test', LOG_LEVEL: 'debug' } }),
    ).toEqual({ NODE_ENV: 'test', LOG_LEVEL: 'debug' })
  })

  it('should throw on values outside the schema', () => {
    expect(() => loadBaseEnv({ source: { NODE_ENV: 'staging' } })).toThrow(
      z.ZodError,
    )
  })

  it('should extend the base schema', () => {
    const schema = createEnvSchema({
      STEPS: z.coerce.number().int().default(100),
    })

    expect(loadEnvVariables(schema, { source: { STEPS: '7' } })).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      STEPS: 7,
    })
    expect(loadEnvVariables(schema, { source: {} }).STEPS).toBe(100)
  })
})
