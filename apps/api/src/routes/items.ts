import { Router, type NextFunction, type Request, type Response } from 'express'
import type { Router as RouterType } from 'express'
import { z } from 'zod'
import type { ItemLookupService } from '../services/item-lookup'

export const itemParamsSchema = z.object({
  collection: z.string().min(1),
  id: z
    .string()
    .regex(/^\d+$/, 'id must be a non-negative integer')
    .transform(Number)
    .refine(Number.isSafeInteger, 'id is out of range'),
})

/**
 * GET /api/:collection/:id
 *
 * Responds with the item's rarity JSON. Cached bytes are sent back exactly
 * as stored; X-Cache tells which path served the request.
 */
export function createItemsRouter(lookupService: ItemLookupService): RouterType {
  const router: RouterType = Router()

  router.get('/:collection/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { collection, id } = itemParamsSchema.parse(req.params)

      const controller = new AbortController()
      res.on('close', () => {
        if (!res.writableFinished) controller.abort()
      })

      const result = await lookupService.lookup({ collection, id, signal: controller.signal })

      res
        .status(200)
        .set('X-Cache', result.cache === 'hit' ? 'HIT' : 'MISS')
        .type('application/json')
        .send(result.body)
    } catch (error) {
      next(error)
    }
  })

  return router
}
