/**
 * Account Service
 * Balance, usage and credit purchases
 */

import { parseResponse, type ExecutorProvider, type QueryParams } from '@/modules/http';
import { accountEndpoints, resourceDefaults } from '../config';
import {
  AccountBalanceSchema,
  AccountUsageSchema,
  CheckoutSessionSchema,
  type AccountBalance,
  type AccountUsage,
  type CheckoutSession,
  type UsageOptions,
} from '../types';

export class AccountService {
  constructor(private readonly executor: ExecutorProvider) {}

  async balance(): Promise<AccountBalance> {
    const data = await this.executor().execute('GET', accountEndpoints.balance);
    return parseResponse(AccountBalanceSchema, data, accountEndpoints.balance);
  }

  async usage(options: UsageOptions = {}): Promise<AccountUsage> {
    const params: QueryParams = {
      days: options.days ?? resourceDefaults.usageDays,
      limit: options.limit ?? resourceDefaults.usageLimit,
    };
    if (options.model) {
      params.model = options.model;
    }

    const data = await this.executor().execute('GET', accountEndpoints.usage, { params });
    return parseResponse(AccountUsageSchema, data, accountEndpoints.usage);
  }

  /**
   * Start a checkout session for `amountCents` worth of credits
   */
  async buyCredits(amountCents: number): Promise<CheckoutSession> {
    const data = await this.executor().execute('POST', accountEndpoints.checkout, {
      json: { amount_cents: amountCents },
    });
    return parseResponse(CheckoutSessionSchema, data, accountEndpoints.checkout);
  }
}
