import OpenAI, { AzureOpenAI } from 'openai';
import { EXPLAIN, FEATURE_LABELS, FEATURE_ORDER } from '../constants.js';
import type { Explainer, ExplanationInput, TrustSignal, VerificationVerdict } from '../types/index.js';

const SYSTEM_PROMPT =
  'You are a payments risk analyst. Explain automated risk decisions to an operations ' +
  'reviewer in two to four plain sentences. Use only the facts provided. Do not invent ' +
  'data, and do not change the decision.';

export interface OpenAIExplainerOptions {
  client: OpenAI;
  /** Model name, or the deployment name for Azure OpenAI */
  model: string;
  name?: string;
  temperature?: number;
  maxTokens?: number;
}

function signalPrompt(signal: TrustSignal): string {
  const ctx = signal.metadata.context_features;
  const contributions = FEATURE_ORDER
    .map((f) => `- ${FEATURE_LABELS[f]}: ${signal.feature_contributions[f].toFixed(3)}`)
    .join('\n');
  const rails = signal.rail_adjustments
    .map((a) => `- ${a.rail_type}: ${a.original_weight} → ${a.adjusted_weight.toFixed(3)} (x${a.adjustment_factor.toFixed(2)})`)
    .join('\n');

  return [
    `Trust score: ${signal.trust_score.toFixed(3)}`,
    `Risk level: ${signal.risk_level}`,
    `Confidence: ${signal.confidence.toFixed(3)}`,
    '',
    'Feature contributions:',
    contributions,
    '',
    'Context:',
    `- device reputation: ${ctx.device_reputation}`,
    `- velocity: ${ctx.velocity} tx/hour`,
    `- IP risk: ${ctx.ip_risk}`,
    `- history length: ${ctx.history_len} transactions`,
    `- channel: ${ctx.channel}`,
    '',
    'Rail adjustments:',
    rails || '- none',
    '',
    'Explain why the score came out as it did and what the rail adjustments mean.',
  ].join('\n');
}

function verdictPrompt(verdict: VerificationVerdict): string {
  const checks = verdict.checks
    .map((c) => `- ${c.check_name}: ${c.status} (${c.reason})`)
    .join('\n');
  return [
    `KYB verdict: ${verdict.status}`,
    `Reason: ${verdict.reason}`,
    `Jurisdiction: ${verdict.metadata.jurisdiction}`,
    `Entity age: ${verdict.metadata.entity_age_days} days`,
    '',
    'Checks:',
    checks,
    '',
    'Explain the verdict and what, if anything, a reviewer should look at.',
  ].join('\n');
}

export function buildPrompt(input: ExplanationInput): string {
  return input.kind === 'verdict' ? verdictPrompt(input.verdict) : signalPrompt(input.signal);
}

/** Chat-completions explainer. Errors propagate; the engine falls back to its template. */
export class OpenAIExplainer implements Explainer {
  readonly name: string;
  readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OpenAIExplainerOptions) {
    this.client = options.client;
    this.model = options.model;
    this.name = options.name ?? `openai:${options.model}`;
    this.temperature = options.temperature ?? 0.2;
    this.maxTokens = options.maxTokens ?? 300;
  }

  async explain(input: ExplanationInput): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildPrompt(input) },
      ],
    });
    return completion.choices[0]?.message.content ?? '';
  }
}

export type ExplainerEnv = Record<string, string | undefined>;

/**
 * Azure OpenAI when endpoint + key + deployment are set, else OpenAI when
 * OPENAI_API_KEY is set, else null (template explanations only). Both clients
 * are capped at EXPLAIN.TIMEOUT_MS per request.
 */
export function createOpenAIExplainer(env: ExplainerEnv = process.env): OpenAIExplainer | null {
  const endpoint = env['AZURE_OPENAI_ENDPOINT'];
  const azureKey = env['AZURE_OPENAI_API_KEY'];
  const deployment = env['AZURE_OPENAI_DEPLOYMENT_NAME'] || 'halyard-llm';
  if (endpoint && azureKey) {
    const client = new AzureOpenAI({
      endpoint,
      apiKey: azureKey,
      deployment,
      apiVersion: env['AZURE_OPENAI_API_VERSION'] || '2024-02-15-preview',
      timeout: EXPLAIN.TIMEOUT_MS,
      maxRetries: EXPLAIN.MAX_RETRIES,
    });
    return new OpenAIExplainer({ client, model: deployment, name: `azure-openai:${deployment}` });
  }

  const apiKey = env['OPENAI_API_KEY'];
  if (apiKey) {
    const model = env['OPENAI_MODEL'] || 'gpt-4o-mini';
    const client = new OpenAI({ apiKey, timeout: EXPLAIN.TIMEOUT_MS, maxRetries: EXPLAIN.MAX_RETRIES });
    return new OpenAIExplainer({ client, model });
  }

  return null;
}
