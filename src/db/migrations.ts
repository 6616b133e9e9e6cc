import { Kysely, Migration, MigrationProvider } from 'kysely'

const migrations: Record<string, Migration> = {}

export const migrationProvider: MigrationProvider = {
  async getMigrations() {
    return migrations
  },
}

// Migration 001: Users, chats and participants
migrations['001'] = {
  async up(db: Kysely<unknown>) {
    await db.schema
      .createTable('user')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('username', 'varchar', (col) => col.notNull().unique())
      .addColumn('firstName', 'varchar', (col) => col.notNull().defaultTo(''))
      .addColumn('lastName', 'varchar', (col) => col.notNull().defaultTo(''))
      .addColumn('phoneNumber', 'varchar', (col) => col.notNull().unique())
      .addColumn('isOnline', 'integer', (col) => col.notNull().defaultTo(0))
      .addColumn('lastSeenAt', 'varchar', (col) => col.notNull())
      .addColumn('createdAt', 'varchar', (col) => col.notNull())
      .execute()

    await db.schema
      .createTable('chat')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('chatType', 'varchar', (col) => col.notNull().defaultTo('personal'))
      .addColumn('name', 'varchar')
      .addColumn('createdBy', 'varchar')
      .addColumn('createdAt', 'varchar', (col) => col.notNull())
      .addColumn('updatedAt', 'varchar', (col) => col.notNull())
      .execute()

    await db.schema
      .createTable('chat_participant')
      .addColumn('chatId', 'varchar', (col) => col.notNull())
      .addColumn('userId', 'varchar', (col) => col.notNull())
      .addColumn('role', 'varchar', (col) => col.notNull().defaultTo('member'))
      .addColumn('joinedAt', 'varchar', (col) => col.notNull())
      .addColumn('lastReadMessageId', 'varchar')
      .addColumn('isMuted', 'integer', (col) => col.notNull().defaultTo(0))
      .execute()
    await db.schema
      .createIndex('chat_participant_pk')
      .on('chat_participant')
      .columns(['chatId', 'userId'])
      .unique()
      .execute()
    // Finding a user's chats
    await db.schema
      .createIndex('chat_participant_user_idx')
      .on('chat_participant')
      .column('userId')
      .execute()
  },
  async down(db: Kysely<unknown>) {
    await db.schema.dropTable('chat_participant').execute()
    await db.schema.dropTable('chat').execute()
    await db.schema.dropTable('user').execute()
  },
}

// Migration 002: Messages, receipts, reactions, delete-for-me markers
migrations['002'] = {
  async up(db: Kysely<unknown>) {
    await db.schema
      .createTable('message')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('chatId', 'varchar', (col) => col.notNull())
      .addColumn('senderId', 'varchar', (col) => col.notNull())
      .addColumn('messageType', 'varchar', (col) => col.notNull().defaultTo('text'))
      .addColumn('content', 'varchar')
      .addColumn('replyTo', 'varchar')
      .addColumn('rev', 'varchar', (col) => col.notNull())
      .addColumn('isDeleted', 'integer', (col) => col.notNull().defaultTo(0))
      .addColumn('deletedForEveryone', 'integer', (col) => col.notNull().defaultTo(0))
      .addColumn('createdAt', 'varchar', (col) => col.notNull())
      .execute()
    // History pages are read by chat, ordered by rev
    await db.schema
      .createIndex('message_chat_rev_idx')
      .on('message')
      .columns(['chatId', 'rev'])
      .execute()

    await db.schema
      .createTable('message_receipt')
      .addColumn('messageId', 'varchar', (col) => col.notNull())
      .addColumn('userId', 'varchar', (col) => col.notNull())
      .addColumn('status', 'varchar', (col) => col.notNull().defaultTo('sent'))
      .addColumn('deliveredAt', 'varchar')
      .addColumn('readAt', 'varchar')
      .execute()
    await db.schema
      .createIndex('message_receipt_pk')
      .on('message_receipt')
      .columns(['messageId', 'userId'])
      .unique()
      .execute()
    // Chat-open bulk update filters by recipient
    await db.schema
      .createIndex('message_receipt_user_idx')
      .on('message_receipt')
      .columns(['userId', 'status'])
      .execute()

    await db.schema
      .createTable('message_reaction')
      .addColumn('messageId', 'varchar', (col) => col.notNull())
      .addColumn('userId', 'varchar', (col) => col.notNull())
      .addColumn('emoji', 'varchar', (col) => col.notNull())
      .addColumn('createdAt', 'varchar', (col) => col.notNull())
      .execute()
    await db.schema
      .createIndex('message_reaction_pk')
      .on('message_reaction')
      .columns(['messageId', 'userId'])
      .unique()
      .execute()

    await db.schema
      .createTable('deleted_message')
      .addColumn('messageId', 'varchar', (col) => col.notNull())
      .addColumn('userId', 'varchar', (col) => col.notNull())
      .addColumn('deletedAt', 'varchar', (col) => col.notNull())
      .execute()
    await db.schema
      .createIndex('deleted_message_pk')
      .on('deleted_message')
      .columns(['messageId', 'userId'])
      .unique()
      .execute()
  },
  async down(db: Kysely<unknown>) {
    await db.schema.dropTable('deleted_message').execute()
    await db.schema.dropTable('message_reaction').execute()
    await db.schema.dropTable('message_receipt').execute()
    await db.schema.dropTable('message').execute()
  },
}

// Migration 003: Calls
migrations['003'] = {
  async up(db: Kysely<unknown>) {
    await db.schema
      .createTable('call')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('callerId', 'varchar', (col) => col.notNull())
      .addColumn('receiverId', 'varchar', (col) => col.notNull())
      .addColumn('callType', 'varchar', (col) => col.notNull().defaultTo('voice'))
      .addColumn('status', 'varchar', (col) => col.notNull().defaultTo('initiated'))
      .addColumn('startedAt', 'varchar', (col) => col.notNull())
      .addColumn('answeredAt', 'varchar')
      .addColumn('endedAt', 'varchar')
      .addColumn('duration', 'integer', (col) => col.notNull().defaultTo(0))
      .execute()
    // Call history for either side
    await db.schema
      .createIndex('call_caller_idx')
      .on('call')
      .columns(['callerId', 'startedAt'])
      .execute()
    await db.schema
      .createIndex('call_receiver_idx')
      .on('call')
      .columns(['receiverId', 'startedAt'])
      .execute()
  },
  async down(db: Kysely<unknown>) {
    await db.schema.dropTable('call').execute()
  },
}
