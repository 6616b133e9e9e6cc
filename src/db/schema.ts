export type DatabaseSchema = {
  user: User
  chat: Chat
  chat_participant: ChatParticipant
  message: Message
  message_receipt: MessageReceipt
  message_reaction: MessageReaction
  deleted_message: DeletedMessage
  call: Call
}

// Identity is owned elsewhere; rows here are the profile the relay needs
export type User = {
  id: string            // Primary key
  username: string
  firstName: string
  lastName: string
  phoneNumber: string
  isOnline: number      // 0 = offline, 1 = online
  lastSeenAt: string
  createdAt: string
}

export type Chat = {
  id: string            // UUID
  chatType: string      // 'personal' | 'group' | 'broadcast'
  name: string | null   // Groups and broadcasts only
  createdBy: string | null
  createdAt: string
  updatedAt: string     // Last activity timestamp
}

export type ChatParticipant = {
  chatId: string        // FK to chat.id
  userId: string        // FK to user.id
  role: string          // 'admin' | 'member'
  joinedAt: string
  lastReadMessageId: string | null
  isMuted: number       // 0 = not muted, 1 = muted
}

export type Message = {
  id: string            // UUID
  chatId: string        // FK to chat.id
  senderId: string      // FK to user.id
  messageType: string   // 'text' | 'image' | ...
  content: string | null
  replyTo: string | null  // FK to message.id
  rev: string           // Monotonic sort key
  isDeleted: number
  deletedForEveryone: number
  createdAt: string
}

// One row per (message, recipient)
export type MessageReceipt = {
  messageId: string
  userId: string
  status: string        // 'sent' | 'delivered' | 'read'
  deliveredAt: string | null
  readAt: string | null
}

// One row per (message, user)
export type MessageReaction = {
  messageId: string
  userId: string
  emoji: string
  createdAt: string
}

// Delete-for-me markers
export type DeletedMessage = {
  messageId: string
  userId: string
  deletedAt: string
}

export type Call = {
  id: string            // UUID
  callerId: string
  receiverId: string
  callType: string      // 'voice' | 'video'
  status: string        // see realtime/calls.ts
  startedAt: string
  answeredAt: string | null
  endedAt: string | null
  duration: number      // Seconds, 0 until ended after an answer
}
