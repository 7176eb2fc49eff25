/**
 * Messaging Module - Encrypted chats
 *
 * One chat per unordered address pair, registered under the canonical
 * pair key. Messages are append-only; the ledger stores ciphertext and a
 * content hash and never looks inside either. The read flag only moves
 * from false to true, and only the recipient may move it.
 */

import { LedgerError } from '../errors.js';
import { sanitizeForAutomerge, type TxContext, type LedgerStateManager } from '../chronicle/ledger-state.js';
import { assertAddress, canonicalPair, chatPairKey, lookup } from './keys.js';
import type { Address, Chat, ChatRecord, Message, MessageRecord, ObjectId } from '../ledger-types.js';

export interface MessagingConfig {
  state: LedgerStateManager;
}

function toChat(record: ChatRecord): Chat {
  return {
    id: record.id,
    participant1: record.participant1,
    participant2: record.participant2,
    createdAt: record.createdAt,
    messageCount: record.messages.length
  };
}

function toMessage(record: MessageRecord, index: number): Message {
  return {
    index,
    sender: record.sender,
    ciphertext: new Uint8Array(record.ciphertext),
    contentHash: new Uint8Array(record.contentHash),
    sentAt: record.sentAt,
    read: record.read
  };
}

function isParticipant(chat: ChatRecord, user: Address): boolean {
  return chat.participant1 === user || chat.participant2 === user;
}

export class MessagingStore {
  private readonly state: LedgerStateManager;

  constructor(config: MessagingConfig) {
    this.state = config.state;
  }

  /**
   * Open a chat with another address. Returns the existing chat ID when
   * the pair already has one.
   */
  startChat(sender: Address, other: Address): ObjectId {
    if (other === sender) {
      throw new LedgerError('SelfChat', 'Cannot start a chat with yourself');
    }
    const existing = lookup(this.state.getState().chatKeys, chatPairKey(sender, other));
    if (existing !== undefined) {
      return existing;
    }

    const chatId = this.state.execute('chat::start', sender, (tx) => {
      const key = chatPairKey(tx.sender, other);
      const registered = lookup(tx.state.chatKeys, key);
      if (registered !== undefined) {
        return registered;
      }

      const [participant1, participant2] = canonicalPair(tx.sender, other);
      const id = tx.newObjectId();
      tx.state.chats[id] = {
        id,
        participant1,
        participant2,
        createdAt: tx.timestamp,
        messages: []
      };
      tx.state.chatKeys[key] = id;

      tx.emit({ type: 'ChatCreated', data: { chatId: id, participant1, participant2 } });
      return id;
    });

    console.log(`[Chats] 💬 Chat ${chatId.slice(0, 8)} between ${sender.slice(0, 8)} and ${other.slice(0, 8)}`);
    return chatId;
  }

  /**
   * Append a message to the chat.
   *
   * @returns Index of the new message
   */
  sendMessage(sender: Address, chatId: ObjectId, ciphertext: Uint8Array, contentHash: Uint8Array): number {
    const index = this.state.execute('chat::send_message', sender, (tx) => {
      const chat = this.record(tx, chatId);
      if (!isParticipant(chat, tx.sender)) {
        throw new LedgerError('NotParticipant', 'Only chat participants can send messages');
      }
      if (ciphertext.length === 0) {
        throw new LedgerError('EmptyMessage', 'Message ciphertext cannot be empty');
      }

      chat.messages.push(sanitizeForAutomerge({
        sender: tx.sender,
        ciphertext,
        contentHash,
        sentAt: tx.timestamp,
        read: false
      }));
      const position = chat.messages.length - 1;
      const recipient = chat.participant1 === tx.sender ? chat.participant2 : chat.participant1;

      tx.emit({
        type: 'MessageSent',
        data: { chatId, sender: tx.sender, recipient, index: position }
      });
      return position;
    });

    console.log(`[Chats] ✉️ ${sender.slice(0, 8)} sent message #${index} in ${chatId.slice(0, 8)}`);
    return index;
  }

  /**
   * Mark a received message as read
   */
  markAsRead(sender: Address, chatId: ObjectId, index: number): void {
    this.state.execute('chat::mark_as_read', sender, (tx) => {
      const chat = this.record(tx, chatId);
      if (!isParticipant(chat, tx.sender)) {
        throw new LedgerError('NotParticipant', 'Only chat participants can read messages');
      }
      if (!Number.isInteger(index) || index < 0 || index >= chat.messages.length) {
        throw new LedgerError('IndexOutOfRange', `Message #${index} does not exist (chat has ${chat.messages.length})`);
      }

      const message = chat.messages[index];
      if (message.sender === tx.sender) {
        throw new LedgerError('NotParticipant', 'Senders cannot mark their own messages as read');
      }
      if (message.read) {
        throw new LedgerError('AlreadyRead', `Message #${index} is already read`);
      }

      message.read = true;
      tx.emit({
        type: 'MessageRead',
        data: { chatId, reader: tx.sender, sender: message.sender, index }
      });
    });

    console.log(`[Chats] 👁️ ${sender.slice(0, 8)} read message #${index} in ${chatId.slice(0, 8)}`);
  }

  /**
   * Full history, oldest first
   *
   * @throws LedgerError NotFound for an unknown chat
   */
  getMessages(chatId: ObjectId): Message[] {
    return Array.from(this.requireChat(chatId).messages, toMessage);
  }

  /**
   * Messages in the chat not sent by `user` and not yet read
   */
  getUnreadCount(chatId: ObjectId, user: Address): number {
    return Array.from(this.requireChat(chatId).messages)
      .filter(message => message.sender !== user && !message.read)
      .length;
  }

  getChat(chatId: ObjectId): Chat | undefined {
    const record = lookup(this.state.getState().chats, chatId);
    return record ? toChat(record) : undefined;
  }

  getChatId(a: Address, b: Address): ObjectId | undefined {
    return lookup(this.state.getState().chatKeys, chatPairKey(a, b));
  }

  /**
   * Every chat the address takes part in, oldest first
   */
  getChatsFor(user: Address): Chat[] {
    assertAddress(user);
    return Object.values(this.state.getState().chats)
      .filter(chat => isParticipant(chat, user))
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(toChat);
  }

  private record(tx: TxContext, chatId: ObjectId): ChatRecord {
    const chat = lookup(tx.state.chats, chatId);
    if (!chat) {
      throw new LedgerError('NotFound', `Chat ${chatId} not found`);
    }
    return chat;
  }

  private requireChat(chatId: ObjectId): ChatRecord {
    const chat = lookup(this.state.getState().chats, chatId);
    if (!chat) {
      throw new LedgerError('NotFound', `Chat ${chatId} not found`);
    }
    return chat;
  }
}
