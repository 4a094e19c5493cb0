export * from '@/types/schema'
export * from '@/errors'
