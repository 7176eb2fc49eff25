/**
 * Profiles Module - Identity registry
 *
 * Handles:
 * - Global username uniqueness (UTF-8 hex of username -> owner)
 * - Profile creation, one per address
 * - Owner-only profile updates, including atomic renames
 */

import { LedgerError } from '../errors.js';
import { codePointLength, lookup, usernameKey } from './keys.js';
import type { LedgerStateManager } from '../chronicle/ledger-state.js';
import type { Address, ObjectId, Profile, ProfileRecord } from '../ledger-types.js';

export const USERNAME_MIN_LENGTH = 3;
export const USERNAME_MAX_LENGTH = 20;

export interface ProfileInput {
  username: string;
  bio: string;
  avatarUrl: string;
}

export interface ProfilesConfig {
  state: LedgerStateManager;
}

function assertUsername(username: string): void {
  const length = codePointLength(username);
  if (length < USERNAME_MIN_LENGTH || length > USERNAME_MAX_LENGTH) {
    throw new LedgerError(
      'InvalidUsername',
      `Username must be ${USERNAME_MIN_LENGTH}-${USERNAME_MAX_LENGTH} characters, got ${length}`
    );
  }
}

function toProfile(record: ProfileRecord): Profile {
  return {
    id: record.id,
    owner: record.owner,
    username: record.username,
    bio: record.bio,
    avatarUrl: record.avatarUrl,
    createdAt: record.createdAt,
    followerCount: record.followerCount,
    followingCount: record.followingCount
  };
}

export class ProfileRegistry {
  private readonly state: LedgerStateManager;

  constructor(config: ProfilesConfig) {
    this.state = config.state;
  }

  /**
   * Reserve a username and create the caller's profile
   */
  createProfile(sender: Address, input: ProfileInput): Profile {
    const profileId = this.state.execute('profile::create', sender, (tx) => {
      const { state } = tx;
      assertUsername(input.username);

      if (lookup(state.usernames, usernameKey(input.username)) !== undefined) {
        throw new LedgerError('UsernameTaken', `Username @${input.username} is already taken`);
      }
      if (lookup(state.profileByOwner, tx.sender) !== undefined) {
        throw new LedgerError('ProfileExists', 'This address already has a profile');
      }

      const id = tx.newObjectId();
      state.usernames[usernameKey(input.username)] = tx.sender;
      state.profileByOwner[tx.sender] = id;
      state.profiles[id] = {
        id,
        owner: tx.sender,
        username: input.username,
        bio: input.bio,
        avatarUrl: input.avatarUrl,
        createdAt: tx.timestamp,
        followerCount: 0,
        followingCount: 0
      };

      tx.emit({
        type: 'ProfileCreated',
        data: { profileId: id, owner: tx.sender, username: input.username }
      });
      return id;
    });

    console.log(`[Profiles] 👤 Created @${input.username} for ${sender.slice(0, 8)}`);
    return this.requireProfile(profileId);
  }

  /**
   * Update bio and avatar, and rename when the username differs.
   * The old mapping is removed and the new one inserted in the same
   * transaction.
   */
  updateProfile(sender: Address, profileId: ObjectId, input: ProfileInput): Profile {
    const previous = this.state.execute('profile::update', sender, (tx) => {
      const { state } = tx;
      const profile = lookup(state.profiles, profileId);
      if (!profile) {
        throw new LedgerError('NotFound', `Profile ${profileId} not found`);
      }
      if (profile.owner !== tx.sender) {
        throw new LedgerError('NotOwner', 'Only the profile owner can update it');
      }

      const oldUsername = profile.username;
      if (input.username !== oldUsername) {
        assertUsername(input.username);
        if (lookup(state.usernames, usernameKey(input.username)) !== undefined) {
          throw new LedgerError('UsernameTaken', `Username @${input.username} is already taken`);
        }
        delete state.usernames[usernameKey(oldUsername)];
        state.usernames[usernameKey(input.username)] = tx.sender;
        profile.username = input.username;
      }

      profile.bio = input.bio;
      profile.avatarUrl = input.avatarUrl;

      tx.emit({
        type: 'ProfileUpdated',
        data: {
          profileId,
          owner: tx.sender,
          username: input.username,
          previousUsername: oldUsername
        }
      });
      return oldUsername;
    });

    if (previous !== input.username) {
      console.log(`[Profiles] ✏️ Renamed @${previous} -> @${input.username}`);
    } else {
      console.log(`[Profiles] ✏️ Updated @${previous}`);
    }
    return this.requireProfile(profileId);
  }

  isUsernameAvailable(username: string): boolean {
    return lookup(this.state.getState().usernames, usernameKey(username)) === undefined;
  }

  /**
   * @throws LedgerError NotFound when no profile holds the username
   */
  getOwnerByUsername(username: string): Address {
    const owner = lookup(this.state.getState().usernames, usernameKey(username));
    if (owner === undefined) {
      throw new LedgerError('NotFound', `Username @${username} is not registered`);
    }
    return owner;
  }

  getProfile(profileId: ObjectId): Profile | undefined {
    const record = lookup(this.state.getState().profiles, profileId);
    return record ? toProfile(record) : undefined;
  }

  getProfileByOwner(owner: Address): Profile | undefined {
    const profileId = lookup(this.state.getState().profileByOwner, owner);
    return profileId === undefined ? undefined : this.getProfile(profileId);
  }

  private requireProfile(profileId: ObjectId): Profile {
    const profile = this.getProfile(profileId);
    if (!profile) {
      throw new LedgerError('NotFound', `Profile ${profileId} not found`);
    }
    return profile;
  }
}
