import { z } from 'zod'

export const Point3DDtoSchema = z.object({
  X: z.number().finite(),
  Y: z.number().finite(),
  Z: z.number().finite()
}).strict()

export type Point3DDto = z.infer<typeof Point3DDtoSchema>
