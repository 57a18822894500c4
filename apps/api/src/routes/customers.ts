import { Router } from 'express'
import { parseIdParam } from '../lib/http'
import { CustomerService } from '../services/customer.service'
import { customerInputSchema, customerListQuerySchema } from '../validation/schemas'

export function createCustomerRoutes(customers: CustomerService): Router {
  const router: Router = Router()

  // GET /api/customers - List customers with search and pagination
  router.get('/', async (req, res, next) => {
    try {
      const query = customerListQuerySchema.parse(req.query)
      res.json(await customers.list(query))
    } catch (error) {
      next(error)
    }
  })

  // GET /api/customers/:id - Get single customer
  router.get('/:id', async (req, res, next) => {
    try {
      const id = parseIdParam(req.params.id, 'Customer')
      res.json(await customers.get(id))
    } catch (error) {
      next(error)
    }
  })

  // POST /api/customers - Create customer
  router.post('/', async (req, res, next) => {
    try {
      const input = customerInputSchema.parse(req.body)
      res.status(201).json(await customers.create(input))
    } catch (error) {
      next(error)
    }
  })

  // PUT /api/customers/:id - Update customer
  router.put('/:id', async (req, res, next) => {
    try {
      const id = parseIdParam(req.params.id, 'Customer')
      const input = customerInputSchema.parse(req.body)
      res.json(await customers.update(id, input))
    } catch (error) {
      next(error)
    }
  })

  // DELETE /api/customers/:id - Delete customer without invoices
  router.delete('/:id', async (req, res, next) => {
    try {
      const id = parseIdParam(req.params.id, 'Customer')
      await customers.delete(id)
      res.status(204).send()
    } catch (error) {
      next(error)
    }
  })

  return router
}
