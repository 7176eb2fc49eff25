/**
 * Interactions Module - Likes, retweets and comments
 *
 * Handles:
 * - One like and one retweet per (suit, user), deduplicated through
 *   composite-key registries
 * - Owned marker objects, destroyed on undo
 * - Comments (never deduplicated, never removed)
 *
 * Counters on the suit are adjusted through the SuitCounters interface only.
 */

import { LedgerError } from '../errors.js';
import { codePointLength, interactionKey, lookup } from './keys.js';
import type { LedgerStateManager, TxContext } from '../chronicle/ledger-state.js';
import type { SuitCounters } from './suits.js';
import type {
  Address,
  Comment,
  CommentRecord,
  InteractionMarkerRecord,
  Like,
  ObjectId,
  Retweet
} from '../ledger-types.js';

export interface InteractionsConfig {
  state: LedgerStateManager;
  suits: SuitCounters;
}

/**
 * Where each marker kind keeps its registry and objects
 */
interface MarkerKind {
  readonly name: 'like' | 'retweet';
  readonly registry: 'likeKeys' | 'retweetKeys';
  readonly objects: 'likes' | 'retweets';
  readonly duplicate: 'AlreadyLiked' | 'AlreadyRetweeted';
}

const LIKE: MarkerKind = { name: 'like', registry: 'likeKeys', objects: 'likes', duplicate: 'AlreadyLiked' };
const RETWEET: MarkerKind = { name: 'retweet', registry: 'retweetKeys', objects: 'retweets', duplicate: 'AlreadyRetweeted' };

function toMarker(record: InteractionMarkerRecord): InteractionMarkerRecord {
  return {
    id: record.id,
    suitId: record.suitId,
    owner: record.owner,
    createdAt: record.createdAt
  };
}

function toComment(record: CommentRecord): Comment {
  return {
    id: record.id,
    suitId: record.suitId,
    owner: record.owner,
    content: record.content,
    createdAt: record.createdAt
  };
}

export class InteractionLedger {
  private readonly state: LedgerStateManager;
  private readonly suits: SuitCounters;

  constructor(config: InteractionsConfig) {
    this.state = config.state;
    this.suits = config.suits;
  }

  // =================================================================
  //  LIKES
  // =================================================================

  likeSuit(sender: Address, suitId: ObjectId): Like {
    const likeId = this.state.execute('interactions::like', sender, (tx) => {
      const id = this.addMarker(tx, LIKE, suitId);
      this.suits.incrementLike(tx, suitId);
      tx.emit({ type: 'LikeCreated', data: { likeId: id, suitId, liker: tx.sender } });
      return id;
    });

    console.log(`[Interactions] ❤️ ${sender.slice(0, 8)} liked ${suitId.slice(0, 8)}`);
    return this.requireMarker(LIKE, likeId);
  }

  /**
   * Undo a like. The caller must hold the Like and it must belong to suitId.
   */
  unlikeSuit(sender: Address, likeId: ObjectId, suitId: ObjectId): void {
    this.state.execute('interactions::unlike', sender, (tx) => {
      this.removeMarker(tx, LIKE, likeId, suitId);
      this.suits.decrementLike(tx, suitId);
      tx.emit({ type: 'LikeRemoved', data: { likeId, suitId, liker: tx.sender } });
    });

    console.log(`[Interactions] 💔 ${sender.slice(0, 8)} unliked ${suitId.slice(0, 8)}`);
  }

  hasLiked(suitId: ObjectId, user: Address): boolean {
    return this.hasMarker(LIKE, suitId, user);
  }

  getLike(likeId: ObjectId): Like | undefined {
    return this.getMarker(LIKE, likeId);
  }

  getOwnedLikes(owner: Address): Like[] {
    return this.ownedMarkers(LIKE, owner);
  }

  // =================================================================
  //  RETWEETS
  // =================================================================

  retweetSuit(sender: Address, suitId: ObjectId): Retweet {
    const retweetId = this.state.execute('interactions::retweet', sender, (tx) => {
      const id = this.addMarker(tx, RETWEET, suitId);
      this.suits.incrementRetweet(tx, suitId);
      tx.emit({ type: 'RetweetCreated', data: { retweetId: id, suitId, retweeter: tx.sender } });
      return id;
    });

    console.log(`[Interactions] 🔁 ${sender.slice(0, 8)} retweeted ${suitId.slice(0, 8)}`);
    return this.requireMarker(RETWEET, retweetId);
  }

  unretweetSuit(sender: Address, retweetId: ObjectId, suitId: ObjectId): void {
    this.state.execute('interactions::unretweet', sender, (tx) => {
      this.removeMarker(tx, RETWEET, retweetId, suitId);
      this.suits.decrementRetweet(tx, suitId);
      tx.emit({ type: 'RetweetRemoved', data: { retweetId, suitId, retweeter: tx.sender } });
    });

    console.log(`[Interactions] ↩️ ${sender.slice(0, 8)} undid retweet of ${suitId.slice(0, 8)}`);
  }

  hasRetweeted(suitId: ObjectId, user: Address): boolean {
    return this.hasMarker(RETWEET, suitId, user);
  }

  getRetweet(retweetId: ObjectId): Retweet | undefined {
    return this.getMarker(RETWEET, retweetId);
  }

  getOwnedRetweets(owner: Address): Retweet[] {
    return this.ownedMarkers(RETWEET, owner);
  }

  // =================================================================
  //  COMMENTS
  // =================================================================

  commentOnSuit(sender: Address, suitId: ObjectId, content: string): Comment {
    const commentId = this.state.execute('interactions::comment', sender, (tx) => {
      if (codePointLength(content) === 0) {
        throw new LedgerError('EmptyComment', 'Comment cannot be empty');
      }
      // Unknown suit aborts before the comment object is created
      this.suits.creatorOf(tx, suitId);

      const id = tx.newObjectId();
      tx.state.comments[id] = {
        id,
        suitId,
        owner: tx.sender,
        content,
        createdAt: tx.timestamp
      };
      this.suits.incrementComment(tx, suitId);

      tx.emit({ type: 'CommentCreated', data: { commentId: id, suitId, commenter: tx.sender, content } });
      return id;
    });

    console.log(`[Interactions] 💬 ${sender.slice(0, 8)} commented on ${suitId.slice(0, 8)}`);
    const comment = this.getComment(commentId);
    if (!comment) {
      throw new LedgerError('NotFound', `Comment ${commentId} not found`);
    }
    return comment;
  }

  getComment(commentId: ObjectId): Comment | undefined {
    const record = lookup(this.state.getState().comments, commentId);
    return record ? toComment(record) : undefined;
  }

  // =================================================================
  //  Marker state machine: absent <-> present
  // =================================================================

  private addMarker(tx: TxContext, kind: MarkerKind, suitId: ObjectId): ObjectId {
    const creator = this.suits.creatorOf(tx, suitId);
    if (creator === tx.sender) {
      throw new LedgerError('CannotActOnOwnPost', `Cannot ${kind.name} your own suit`);
    }

    const key = interactionKey(suitId, tx.sender);
    const registry = tx.state[kind.registry];
    if (lookup(registry, key) !== undefined) {
      throw new LedgerError(kind.duplicate, `Suit already has your ${kind.name}`);
    }

    const id = tx.newObjectId();
    registry[key] = true;
    tx.state[kind.objects][id] = {
      id,
      suitId,
      owner: tx.sender,
      createdAt: tx.timestamp
    };
    return id;
  }

  private removeMarker(tx: TxContext, kind: MarkerKind, markerId: ObjectId, suitId: ObjectId): void {
    const objects = tx.state[kind.objects];
    const marker = lookup(objects, markerId);
    if (!marker) {
      throw new LedgerError('NotFound', `No ${kind.name} with id ${markerId}`);
    }
    if (marker.owner !== tx.sender) {
      throw new LedgerError('NotOwner', `This ${kind.name} belongs to another address`);
    }
    if (marker.suitId !== suitId) {
      throw new LedgerError('MismatchedPost', `This ${kind.name} is bound to a different suit`);
    }

    delete tx.state[kind.registry][interactionKey(suitId, tx.sender)];
    delete objects[markerId];
  }

  private hasMarker(kind: MarkerKind, suitId: ObjectId, user: Address): boolean {
    const registry = this.state.getState()[kind.registry];
    return lookup(registry, interactionKey(suitId, user)) === true;
  }

  private getMarker(kind: MarkerKind, markerId: ObjectId): InteractionMarkerRecord | undefined {
    const record = lookup(this.state.getState()[kind.objects], markerId);
    return record ? toMarker(record) : undefined;
  }

  private ownedMarkers(kind: MarkerKind, owner: Address): InteractionMarkerRecord[] {
    return Object.values(this.state.getState()[kind.objects])
      .filter(record => record.owner === owner)
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(toMarker);
  }

  private requireMarker(kind: MarkerKind, markerId: ObjectId): InteractionMarkerRecord {
    const marker = this.getMarker(kind, markerId);
    if (!marker) {
      throw new LedgerError('NotFound', `No ${kind.name} with id ${markerId}`);
    }
    return marker;
  }
}
