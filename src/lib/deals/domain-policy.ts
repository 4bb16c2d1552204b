import { z } from 'zod';
import rawPolicy from '../../../config/domain-policy.json';
import { hostnameOf } from '../../utils/domain.js';

/**
 * Per-domain extraction policy.
 *
 *  exclude                     – never a product page (video, social, forum, wiki, blog)
 *  force_full_extraction       – snippet prices are not trusted; always fetch the page
 *  prefer_full_retail_phrasing – carrier pages: only "full retail / outright" prices count,
 *                                snippet prices without that phrasing force full extraction
 *  one_time_purchase           – the store sells outright; "/month" only with subscription wording
 *  rich_markup                 – large marketplace: markdown extraction + aggressive price prompt
 */
export const POLICY_ACTIONS = [
  'exclude',
  'force_full_extraction',
  'prefer_full_retail_phrasing',
  'one_time_purchase',
  'rich_markup',
] as const;

export type PolicyAction = (typeof POLICY_ACTIONS)[number];

const ruleSchema = z.object({
  domain: z.string().min(1).transform((d) => d.toLowerCase().replace(/^www\./, '')),
  actions: z.array(z.enum(POLICY_ACTIONS)).min(1),
});

const tableSchema = z.object({ rules: z.array(ruleSchema) });

export type DomainRule = z.infer<typeof ruleSchema>;

export interface DomainPolicy {
  exclude: boolean;
  forceFullExtraction: boolean;
  preferFullRetail: boolean;
  oneTimePurchase: boolean;
  richMarkup: boolean;
}

const EMPTY_POLICY: DomainPolicy = {
  exclude: false,
  forceFullExtraction: false,
  preferFullRetail: false,
  oneTimePurchase: false,
  richMarkup: false,
};

const REVIEW_KEYWORDS = ['review', 'comparison', 'forum', 'discussion', 'article', 'blog'];

export class DomainPolicyTable {
  private readonly byDomain = new Map<string, Set<PolicyAction>>();

  constructor(rules: DomainRule[]) {
    for (const rule of rules) {
      const actions = this.byDomain.get(rule.domain) ?? new Set<PolicyAction>();
      rule.actions.forEach((a) => actions.add(a));
      this.byDomain.set(rule.domain, actions);
    }
  }

  static fromJson(input: unknown): DomainPolicyTable {
    return new DomainPolicyTable(tableSchema.parse(input).rules);
  }

  /** Rules match the host itself or any subdomain of it. */
  policyFor(url: string): DomainPolicy {
    const host = hostnameOf(url);
    if (!host) return { ...EMPTY_POLICY };

    const actions = new Set<PolicyAction>();
    for (const [domain, ruleActions] of this.byDomain) {
      if (host === domain || host.endsWith(`.${domain}`)) {
        ruleActions.forEach((a) => actions.add(a));
      }
    }

    return {
      exclude: actions.has('exclude'),
      forceFullExtraction: actions.has('force_full_extraction'),
      preferFullRetail: actions.has('prefer_full_retail_phrasing'),
      oneTimePurchase: actions.has('one_time_purchase'),
      richMarkup: actions.has('rich_markup'),
    };
  }

  /**
   * Reason a hit is rejected before any price work, or null to keep it.
   * Covers excluded domains, PDFs and review-style URLs or titles.
   */
  hardExclusion(url: string, title: string): string | null {
    if (this.policyFor(url).exclude) return 'excluded domain';

    const urlLower = url.toLowerCase();
    if (urlLower.endsWith('.pdf') || urlLower.includes('/pdf')) return 'pdf';

    const titleLower = title.toLowerCase();
    const keyword = REVIEW_KEYWORDS.find((k) => urlLower.includes(k) || titleLower.includes(k));
    return keyword ? `non-product page (${keyword})` : null;
  }
}

export const defaultDomainPolicy = DomainPolicyTable.fromJson(rawPolicy);
