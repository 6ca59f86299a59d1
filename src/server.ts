import Fastify from 'fastify'
import type { FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import { registerRecommendationRoutes } from './api/recommendation.js'
import type { RecommendationRouteDeps } from './api/recommendation.js'

export interface ServerOptions {
  logger?: boolean
}

export async function buildServer(deps: RecommendationRouteDeps, options: ServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({ logger: options.logger ?? true })
  await server.register(cors, { methods: ['GET'] })

  server.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }))
  await registerRecommendationRoutes(server, deps)

  return server
}
