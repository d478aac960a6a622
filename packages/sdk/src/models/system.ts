import { z } from 'zod'

export const ServiceStatusSchema = z.enum(['online', 'offline'])
export type ServiceStatus = z.infer<typeof ServiceStatusSchema>

export const SystemHealthSchema = z.object({
  database_status: z.string(),
  cache_status: z.string(),
  version: z.string(),
})
export type SystemHealth = z.infer<typeof SystemHealthSchema>
