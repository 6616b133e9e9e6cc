import { Express, Request, Response } from 'express'
import { z } from 'zod'
import { AppContext } from '../config'
import { logError } from '../logger'
import { MessageRecord } from '../store'
import { chatTopic } from '../realtime/connection'
import { encodeMessagesRead } from '../realtime/protocol'
import { authMiddleware, currentUser, queryLimit, queryString, rateLimitMiddleware } from './middleware'

// ============================================
// TYPES
// ============================================

interface MessageView {
  id: string
  chat_id: string
  sender_id: string
  content: string | null
  message_type: string
  reply_to: string | null
  rev: string
  created_at: string
}

const openChatBody = z.object({
  before_message_id: z.string().min(1).optional(),
})

function toMessageView(message: MessageRecord): MessageView {
  return {
    id: message.id,
    chat_id: message.chatId,
    sender_id: message.senderId,
    content: message.content,
    message_type: message.messageType,
    reply_to: message.replyTo,
    rev: message.rev,
    created_at: message.createdAt,
  }
}

const DEFAULT_PAGE_SIZE = 50
const MAX_PAGE_SIZE = 100

// ============================================
// MAIN EXPORT
// ============================================

export default function (app: Express, ctx: AppContext) {
  // Apply middleware to all chat routes
  app.use('/chats', rateLimitMiddleware)
  app.use('/chats', authMiddleware(ctx))

  // ========================================
  // POST /chats/:chatId/open - Mark everything up to a message as read
  // ========================================
  app.post('/chats/:chatId/open', async (req: Request, res: Response) => {
    try {
      const user = currentUser(req)
      const { chatId } = req.params

      const body = openChatBody.safeParse(req.body ?? {})
      if (!body.success) {
        return res.status(400).json({ error: 'Invalid request body', details: body.error.issues })
      }

      if (!(await ctx.store.isParticipant(chatId, user.id))) {
        return res.status(404).json({ error: 'Chat not found' })
      }

      const now = ctx.clock()
      const messageIds = await ctx.delivery.openChat(chatId, user.id, now, body.data.before_message_id)
      if (messageIds.length > 0) {
        ctx.broker.publish(chatTopic(chatId), encodeMessagesRead(chatId, user.id, messageIds, now))
      }

      return res.json({ message_ids: messageIds })
    } catch (error) {
      logError('[Chat] Error opening chat', error)
      return res.status(500).json({ error: 'Internal server error' })
    }
  })

  // ========================================
  // GET /chats/:chatId/messages - History, oldest first
  // ========================================
  app.get('/chats/:chatId/messages', async (req: Request, res: Response) => {
    try {
      const user = currentUser(req)
      const { chatId } = req.params
      const limit = queryLimit(req.query.limit, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE)
      const before = queryString(req.query.before)

      if (!(await ctx.store.isParticipant(chatId, user.id))) {
        return res.status(404).json({ error: 'Chat not found' })
      }

      const messages = await ctx.store.listMessages(chatId, user.id, { beforeMessageId: before, limit })

      // A full page means there may be older messages
      const cursor = messages.length === limit ? messages[0].id : undefined

      return res.json({
        messages: messages.map(toMessageView),
        cursor,
      })
    } catch (error) {
      logError('[Chat] Error listing messages', error)
      return res.status(500).json({ error: 'Internal server error' })
    }
  })
}
