import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import {
  CreateIssueInputSchema,
  formatZodError,
  requireId,
  UpdateIssueInputSchema,
  validate,
} from '@/core/issue/validation'
import { ValidationError } from '@/types'

describe('formatZodError', () => {
  it('joins each issue as path: message', () => {
    const result = z.object({ a: z.number(), b: z.object({ c: z.string() }) }).safeParse({ a: 'x', b: {} })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(formatZodError(result.error)).toBe(
        'a: Expected number, received string; b.c: Required',
      )
    }
  })

  it('omits the path for root-level issues', () => {
    const result = z.string().safeParse(1)
    if (!result.success) {
      expect(formatZodError(result.error)).toBe('Expected string, received number')
    }
  })
})

describe('validate', () => {
  it('applies create defaults', () => {
    expect(validate(CreateIssueInputSchema, { title: 'x' })._unsafeUnwrap()).toEqual({
      title: 'x',
      description: '',
      priority: 2,
      issue_type: 'task',
      assignee: null,
      parent_id: null,
      discovered_from: null,
      metadata: {},
    })
  })

  it('reports the priority range', () => {
    const error = validate(CreateIssueInputSchema, { title: 'x', priority: 7 })._unsafeUnwrapErr()
    expect(error).toBeInstanceOf(ValidationError)
    expect(error.message).toBe('priority: Priority must be 0-4')
    expect(error.cause).toBeInstanceOf(z.ZodError)
  })

  it('keeps only the keys an update supplied', () => {
    expect(validate(UpdateIssueInputSchema, { status: 'done', assignee: null })._unsafeUnwrap()).toEqual({
      status: 'completed',
      assignee: null,
    })
  })
})

describe('requireId', () => {
  it('accepts a non-blank id and names the field otherwise', () => {
    expect(requireId('from_id', 'abc')._unsafeUnwrap()).toBe('abc')
    expect(requireId('from_id', ' ')._unsafeUnwrapErr().message).toBe('from_id is required')
  })
})
