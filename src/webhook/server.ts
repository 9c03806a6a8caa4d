/**
 * Webhook Server — HTTP surface of the mention tracker.
 *
 * Wires routes.ts onto an Express app and owns the listening socket.
 */

import type { Server } from 'node:http'
import express from 'express'
import type { ServerConfig } from '../core/config.js'
import { createLogger } from '../infra/logger.js'
import type { MentionTracker } from '../tracker/index.js'
import { setupMiddleware, setupRoutes } from './routes.js'

const log = createLogger('webhook')

export class WebhookServer {
  readonly app = express()
  private server: Server | null = null

  constructor(
    private tracker: MentionTracker,
    private config: ServerConfig,
  ) {
    setupMiddleware(this.app)
    setupRoutes(this.app, this.tracker, this.config)
  }

  /** Start listening. Resolves with the bound port (useful with port 0). */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port)
      server.once('error', reject)
      server.once('listening', () => {
        this.server = server
        const address = server.address()
        const port = address && typeof address === 'object' ? address.port : this.config.port
        log.info(`Listening on port ${port}`, {
          endpoints: [
            'GET    /health',
            'POST   /rooms/:roomId/messages',
            'GET    /rooms/:roomId/mentions/:subjectId',
            'DELETE /rooms/:roomId/records',
            'POST   /sweep',
          ],
        })
        resolve(port)
      })
    })
  }

  stop(): Promise<void> {
    const server = this.server
    if (!server) return Promise.resolve()
    this.server = null
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()))
    })
  }
}
