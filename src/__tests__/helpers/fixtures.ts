/**
 * Shared test schemas.
 */

import {
  listAttribute,
  mapAttribute,
  numberAttribute,
  stringAttribute,
  stringSetAttribute,
} from '../../attributes/factories.js';
import { stringCodec } from '../../attributes/codecs.js';
import type { AttributeValueMap } from '../../types/key.js';
import { Schema } from '../../schema/schema.js';

// contacts: composite key (user_id, email)
export const userId = stringAttribute('user_id', { hashKey: true });
export const email = stringAttribute('email', { rangeKey: true });
export const nickname = stringAttribute('nickname');
export const visits = numberAttribute('visits');
export const status = stringAttribute('status', { default: () => 'active' });
export const tags = listAttribute('tags', stringCodec());
export const roles = stringSetAttribute('roles');
export const profile = mapAttribute('profile');
export const city = profile.child('city', stringCodec());

export interface Contact {
  user_id: string;
  email: string;
  nickname?: string;
  visits?: number;
  status?: string;
  tags?: string[];
  roles?: Set<string>;
  profile?: AttributeValueMap;
}

export function contactSchema(): Schema<Contact> {
  return new Schema<Contact>('contacts', [userId, email, nickname, visits, status, tags, roles, profile]);
}

// accounts: hash key only
export const accountId = stringAttribute('account_id', { hashKey: true });
export const plan = stringAttribute('plan');
export const credits = numberAttribute('credits');
export const owner = stringAttribute('owner', { required: true });

export interface Account {
  account_id: string;
  owner: string;
  plan?: string;
  credits?: number;
}

export function accountSchema(): Schema<Account> {
  return new Schema<Account>('accounts', [accountId, owner, plan, credits]);
}
