import { Express, Request, Response } from 'express'
import { z } from 'zod'
import { AppContext } from '../config'
import { logError } from '../logger'
import { CALL_TYPES, CallRecord, CallStatus } from '../store'
import { authMiddleware, currentUser, queryLimit, rateLimitMiddleware } from './middleware'

interface CallView {
  id: string
  caller_id: string
  receiver_id: string
  call_type: string
  status: CallStatus
  started_at: string
  answered_at: string | null
  ended_at: string | null
  duration: number
}

const createCallBody = z.object({
  receiver_id: z.string().min(1),
  call_type: z.enum(CALL_TYPES).default('voice'),
})

// `answered` is what clients send when the callee picks up
const updateStatusBody = z.object({
  status: z.enum(['ringing', 'answered', 'ongoing', 'ended', 'missed', 'declined', 'failed']),
})

export function toCallView(call: CallRecord): CallView {
  return {
    id: call.id,
    caller_id: call.callerId,
    receiver_id: call.receiverId,
    call_type: call.callType,
    status: call.status,
    started_at: call.startedAt,
    answered_at: call.answeredAt,
    ended_at: call.endedAt,
    duration: call.duration,
  }
}

export default function (app: Express, ctx: AppContext) {
  app.use('/calls', rateLimitMiddleware)
  app.use('/calls', authMiddleware(ctx))

  // ========================================
  // POST /calls - Start a call
  // ========================================
  app.post('/calls', async (req: Request, res: Response) => {
    try {
      const user = currentUser(req)
      const body = createCallBody.safeParse(req.body ?? {})
      if (!body.success) {
        return res.status(400).json({ error: 'Invalid request body', details: body.error.issues })
      }

      const { receiver_id, call_type } = body.data
      if (receiver_id === user.id) {
        return res.status(400).json({ error: 'Cannot call yourself' })
      }
      if (!(await ctx.store.getUser(receiver_id))) {
        return res.status(404).json({ error: 'Receiver not found' })
      }

      const call = await ctx.calls.initiate(user, receiver_id, call_type)
      return res.status(201).json({ call: toCallView(call) })
    } catch (error) {
      logError('[Calls] Error creating call', error)
      return res.status(500).json({ error: 'Internal server error' })
    }
  })

  // ========================================
  // POST /calls/:callId/status - Move the call along
  // ========================================
  app.post('/calls/:callId/status', async (req: Request, res: Response) => {
    try {
      const user = currentUser(req)
      const body = updateStatusBody.safeParse(req.body ?? {})
      if (!body.success) {
        return res.status(400).json({ error: 'Invalid request body', details: body.error.issues })
      }

      const target: CallStatus = body.data.status === 'answered' ? 'ongoing' : body.data.status
      const result = await ctx.calls.updateStatus(req.params.callId, user.id, target)

      switch (result.kind) {
        case 'not_found':
          return res.status(404).json({ error: 'Call not found' })
        case 'forbidden':
          return res.status(403).json({ error: 'Not a party to this call' })
        case 'conflict':
          return res.status(409).json({ error: result.error.message, from: result.error.from, to: result.error.to })
        case 'updated':
          return res.json({ call: toCallView(result.call) })
      }
    } catch (error) {
      logError('[Calls] Error updating call status', error)
      return res.status(500).json({ error: 'Internal server error' })
    }
  })

  // ========================================
  // GET /calls - Call history, newest first
  // ========================================
  app.get('/calls', async (req: Request, res: Response) => {
    try {
      const user = currentUser(req)
      const limit = queryLimit(req.query.limit, 50, 100)
      const calls = await ctx.calls.listCalls(user.id, limit)
      return res.json({ calls: calls.map(toCallView) })
    } catch (error) {
      logError('[Calls] Error listing calls', error)
      return res.status(500).json({ error: 'Internal server error' })
    }
  })
}
