/**
 * Suits Ledger Types
 *
 * Records persisted in the ledger document, the public views handed to
 * callers, and the events appended to the outbox.
 */

/** Hex-encoded 32-byte Ed25519 public key */
export type Address = string;

/** Hex-encoded 32-byte identifier allocated by the host */
export type ObjectId = string;

// =================================================================
//  Stored records
// =================================================================

export interface ProfileRecord {
  id: ObjectId;
  owner: Address;
  username: string;
  bio: string;
  avatarUrl: string;
  createdAt: number;
  followerCount: number;
  followingCount: number;
}

export interface SuitRecord {
  id: ObjectId;
  creator: Address;
  content: string;
  mediaUrls: string[];
  createdAt: number;
  likeCount: number;
  commentCount: number;
  retweetCount: number;
  /** Sum of tips received, in minor units */
  tipTotal: number;
}

/**
 * Marker object held by the actor. Likes and retweets share the shape;
 * the collection they live in decides the kind.
 */
export interface InteractionMarkerRecord {
  id: ObjectId;
  suitId: ObjectId;
  owner: Address;
  createdAt: number;
}

export interface CommentRecord {
  id: ObjectId;
  suitId: ObjectId;
  owner: Address;
  content: string;
  createdAt: number;
}

export interface TipBalanceRecord {
  id: ObjectId;
  owner: Address;
  balance: number;
  totalReceived: number;
  totalWithdrawn: number;
}

export interface MessageRecord {
  sender: Address;
  ciphertext: Uint8Array;
  contentHash: Uint8Array;
  sentAt: number;
  read: boolean;
}

export interface ChatRecord {
  id: ObjectId;
  participant1: Address;
  participant2: Address;
  createdAt: number;
  messages: MessageRecord[];
}

/**
 * Entire ledger held in one Automerge document.
 *
 * Registries are the maps keyed by encoded usernames and composite keys; the
 * remaining maps hold the objects themselves.
 */
export type LedgerState = {
  // Identity registry
  /** Keyed by usernameKey(username) */
  usernames: { [usernameKey: string]: Address };
  profileByOwner: { [owner: string]: ObjectId };
  profiles: { [id: string]: ProfileRecord };

  // Post registry
  suitCreators: { [id: string]: Address };
  suitIndex: ObjectId[];
  suits: { [id: string]: SuitRecord };

  // Interaction registry
  likeKeys: { [compositeKey: string]: boolean };
  retweetKeys: { [compositeKey: string]: boolean };
  likes: { [id: string]: InteractionMarkerRecord };
  retweets: { [id: string]: InteractionMarkerRecord };
  comments: { [id: string]: CommentRecord };

  // Tip balance registry
  balanceByOwner: { [owner: string]: ObjectId };
  balances: { [id: string]: TipBalanceRecord };

  // Native coin held by each address
  wallets: { [owner: string]: number };

  // Chat registry
  chatKeys: { [pairKey: string]: ObjectId };
  chats: { [id: string]: ChatRecord };

  // Append-only outbox
  events: LedgerEvent[];
};

// =================================================================
//  Public views
// =================================================================

export type Profile = Readonly<ProfileRecord>;

export interface Suit extends Readonly<Omit<SuitRecord, 'mediaUrls'>> {
  readonly mediaUrls: readonly string[];
}

export type Like = Readonly<InteractionMarkerRecord>;
export type Retweet = Readonly<InteractionMarkerRecord>;
export type Comment = Readonly<CommentRecord>;
export type TipBalance = Readonly<TipBalanceRecord>;

export interface Message extends Readonly<MessageRecord> {
  readonly index: number;
}

export interface Chat {
  readonly id: ObjectId;
  readonly participant1: Address;
  readonly participant2: Address;
  readonly createdAt: number;
  readonly messageCount: number;
}

// =================================================================
//  Events
// =================================================================

export interface LedgerEventPayloads {
  ProfileCreated: { profileId: ObjectId; owner: Address; username: string };
  ProfileUpdated: { profileId: ObjectId; owner: Address; username: string; previousUsername: string };
  PostCreated: { suitId: ObjectId; creator: Address; preview: string };
  LikeCreated: { likeId: ObjectId; suitId: ObjectId; liker: Address };
  LikeRemoved: { likeId: ObjectId; suitId: ObjectId; liker: Address };
  CommentCreated: { commentId: ObjectId; suitId: ObjectId; commenter: Address; content: string };
  RetweetCreated: { retweetId: ObjectId; suitId: ObjectId; retweeter: Address };
  RetweetRemoved: { retweetId: ObjectId; suitId: ObjectId; retweeter: Address };
  BalanceCreated: { balanceId: ObjectId; owner: Address };
  TipSent: { suitId: ObjectId; tipper: Address; recipient: Address; amount: number };
  FundsWithdrawn: { balanceId: ObjectId; owner: Address; amount: number };
  WalletFunded: { owner: Address; amount: number };
  ChatCreated: { chatId: ObjectId; participant1: Address; participant2: Address };
  MessageSent: { chatId: ObjectId; sender: Address; recipient: Address; index: number };
  MessageRead: { chatId: ObjectId; reader: Address; sender: Address; index: number };
}

export type LedgerEventType = keyof LedgerEventPayloads;

export type LedgerEventInput = {
  [K in LedgerEventType]: { type: K; data: LedgerEventPayloads[K] };
}[LedgerEventType];

export type LedgerEvent = LedgerEventInput & {
  /** Position in the outbox, starting at 0 */
  seq: number;
  timestamp: number;
  /** Label of the transaction that produced the event */
  tx: string;
};
