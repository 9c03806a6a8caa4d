/**
 * Express routes — ingestion, queries and admin actions.
 *
 * Route handlers validate input and delegate to MentionTracker. No
 * tracking logic lives here.
 */

import type { Express, NextFunction, Request, Response } from 'express'
import cors from 'cors'
import express from 'express'
import type { ServerConfig } from '../core/config.js'
import { IncomingMessageSchema, toChatMessage } from '../core/message.js'
import { createLogger, errorMessage } from '../infra/logger.js'
import { isValidRoomId } from '../store/record-store.js'
import { serializeRecord } from '../store/schema.js'
import type { MentionTracker } from '../tracker/index.js'

const log = createLogger('webhook')

export const NO_RECENT_MENTIONS = 'No recent mentions'

/* ------------------------------------------------------------------ */
/*  Route setup                                                        */
/* ------------------------------------------------------------------ */

export function setupMiddleware(app: Express): void {
  app.use(cors({ origin: true, credentials: true }))
  app.use(express.json({ limit: '1mb' }))
  app.use((req: Request, _res: Response, next: NextFunction) => {
    log.debug(`${req.method} ${req.path}`)
    next()
  })
}

export function setupRoutes(app: Express, tracker: MentionTracker, config: ServerConfig): void {
  const verifySecret = (req: Request): boolean => {
    const header = req.headers.secret
    const secret =
      (typeof header === 'string' ? header : undefined) ||
      req.headers.authorization?.replace('Bearer ', '')
    return secret === config.secret
  }

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', ...tracker.stats() })
  })

  app.post('/rooms/:roomId/messages', (req, res) => handleIngest(req, res, tracker))
  app.get('/rooms/:roomId/mentions/:subjectId', (req, res) => handleQuery(req, res, tracker))
  app.delete('/rooms/:roomId/records', (req, res) => handleClear(req, res, tracker, verifySecret))
  app.post('/sweep', (req, res) => handleSweep(req, res, tracker, verifySecret))

  // Body parser errors and anything else thrown synchronously
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
        ? err.status
        : 500
    log.error('Request failed', { status, error: errorMessage(err) })
    res.status(status).json({ error: status === 500 ? 'Internal server error' : errorMessage(err) })
  })
}

/* ------------------------------------------------------------------ */
/*  Handlers                                                           */
/* ------------------------------------------------------------------ */

function roomParam(req: Request, res: Response): string | null {
  const { roomId } = req.params
  if (!isValidRoomId(roomId)) {
    res.status(400).json({ error: 'Invalid room id' })
    return null
  }
  return roomId
}

async function handleIngest(req: Request, res: Response, tracker: MentionTracker): Promise<void> {
  const roomId = roomParam(req, res)
  if (!roomId) return

  const parsed = IncomingMessageSchema.safeParse(req.body)
  if (!parsed.success) {
    res.status(400).json({
      error: 'Invalid message',
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    })
    return
  }

  try {
    const result = await tracker.handle(roomId, toChatMessage(parsed.data))
    res.json({ success: true, ...result })
  } catch (error) {
    log.error('Failed to handle message', { roomId, error: errorMessage(error) })
    res.status(500).json({ error: 'Failed to handle message' })
  }
}

function handleQuery(req: Request, res: Response, tracker: MentionTracker): void {
  const roomId = roomParam(req, res)
  if (!roomId) return

  const records = tracker.whoMentioned(roomId, req.params.subjectId).map(serializeRecord)
  if (records.length === 0) {
    res.json({ records, message: NO_RECENT_MENTIONS })
    return
  }
  res.json({ records })
}

async function handleClear(
  req: Request,
  res: Response,
  tracker: MentionTracker,
  verifySecret: (req: Request) => boolean,
): Promise<void> {
  if (!verifySecret(req)) {
    res.status(401).json({ error: 'Unauthorized' })
    return
  }
  const roomId = roomParam(req, res)
  if (!roomId) return

  try {
    const removed = await tracker.clearRoom(roomId)
    res.json({ success: true, removed })
  } catch (error) {
    log.error('Failed to clear room', { roomId, error: errorMessage(error) })
    res.status(500).json({ error: 'Failed to clear room' })
  }
}

async function handleSweep(
  req: Request,
  res: Response,
  tracker: MentionTracker,
  verifySecret: (req: Request) => boolean,
): Promise<void> {
  if (!verifySecret(req)) {
    res.status(401).json({ error: 'Unauthorized' })
    return
  }

  try {
    res.json({ success: true, ...(await tracker.sweep()) })
  } catch (error) {
    log.error('Manual sweep failed', { error: errorMessage(error) })
    res.status(500).json({ error: 'Sweep failed' })
  }
}
