/**
 * @file src/agents/tools.ts
 * @description Tool contract between the language model and the engine
 *
 * Five named tools. Each one validates the model's JSON arguments, calls the
 * mortgage engine and renders the result through a formatter. The model
 * never produces a number itself; it only picks a tool and its arguments.
 *
 * A failing tool returns { ok: false, error } so the model can read the
 * problem and ask the user; nothing here throws into the agent loop.
 */

import { z } from 'zod';
import { MortgageEngine, getMortgageEngine } from '../modules/mortgage';
import {
  formatAffordability,
  formatBuyVsRent,
  formatEligibility,
  formatMortgageQuote,
  formatMortgageRules,
} from '../modules/presentation';
import { InvalidInputError } from '../shared/errors';

// ============================================
// TYPES
// ============================================

export type ToolName =
  | 'calculate_mortgage'
  | 'assess_affordability'
  | 'compare_buy_vs_rent'
  | 'check_eligibility'
  | 'get_mortgage_rules';

export interface JsonSchemaProperty {
  type: 'number' | 'integer' | 'string' | 'boolean';
  description: string;
  enum?: string[];
}

export interface ToolDefinition {
  name: ToolName;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export type ToolResult = { ok: true; output: string } | { ok: false; error: string };

interface MortgageTool {
  definition: ToolDefinition;
  run(args: unknown, engine: MortgageEngine): string;
}

// Models sometimes send null for an argument they mean to omit.
const optionalNumber = z.number().nullish().transform((v) => v ?? undefined);

function defineTool<S extends z.ZodTypeAny>(
  definition: ToolDefinition,
  schema: S,
  handler: (args: z.output<S>, engine: MortgageEngine) => string
): MortgageTool {
  return {
    definition,
    run(args, engine) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'arguments';
        throw new InvalidInputError(field, `${field}: ${issue ? issue.message : 'invalid arguments'}`);
      }
      return handler(parsed.data, engine);
    },
  };
}

// ============================================
// TOOLS
// ============================================

const calculateMortgage = defineTool(
  {
    name: 'calculate_mortgage',
    description:
      'Calculate the monthly mortgage payment (EMI), total interest and upfront cash for a property. ' +
      'Use when the user mentions a property price and wants to know the monthly payment.',
    parameters: {
      type: 'object',
      properties: {
        property_price: { type: 'number', description: 'Property price in AED (e.g. 2000000 for 2M)' },
        down_payment_percent: {
          type: 'number',
          description: 'Down payment percent, minimum 20 for expats. Default: 20',
        },
        interest_rate: { type: 'number', description: 'Annual interest rate percent. Default: 4.5' },
        tenure_years: { type: 'integer', description: 'Loan tenure in years, max 25. Default: 25' },
      },
      required: ['property_price'],
    },
  },
  z.object({
    property_price: z.number(),
    down_payment_percent: optionalNumber,
    interest_rate: optionalNumber,
    tenure_years: optionalNumber,
  }),
  (args, engine) => {
    const quote = engine.computeLoan({
      propertyPrice: args.property_price,
      downPaymentPercent: args.down_payment_percent,
      annualRatePercent: args.interest_rate,
      tenureYears: args.tenure_years,
    });
    const upfront = engine.computeUpfrontCosts({
      propertyPrice: args.property_price,
      downPaymentPercent: args.down_payment_percent,
    });
    return formatMortgageQuote(quote, upfront, engine.policy.currency);
  }
);

const assessAffordability = defineTool(
  {
    name: 'assess_affordability',
    description:
      'Assess what property price the user can afford from their income. ' +
      'Use when the user mentions their income and wants to know their budget.',
    parameters: {
      type: 'object',
      properties: {
        monthly_income: { type: 'number', description: "User's gross monthly income in AED" },
        existing_monthly_debts: {
          type: 'number',
          description: 'Other monthly debt payments (car loan, credit cards). Default: 0',
        },
        monthly_expenses: { type: 'number', description: 'Fixed monthly living expenses in AED. Default: 0' },
        desired_property_price: {
          type: 'number',
          description: 'Optional: a specific property price to check against the budget',
        },
      },
      required: ['monthly_income'],
    },
  },
  z.object({
    monthly_income: z.number(),
    existing_monthly_debts: optionalNumber,
    monthly_expenses: optionalNumber,
    desired_property_price: optionalNumber,
  }),
  (args, engine) => {
    const assessment = engine.computeAffordability({
      monthlyIncome: args.monthly_income,
      existingDebts: args.existing_monthly_debts,
      monthlyExpenses: args.monthly_expenses,
    });
    const target =
      args.desired_property_price !== undefined && args.desired_property_price > 0
        ? engine.classifyTargetPrice(assessment, args.desired_property_price)
        : undefined;
    return formatAffordability(assessment, target, engine.policy.currency);
  }
);

const compareBuyVsRent = defineTool(
  {
    name: 'compare_buy_vs_rent',
    description:
      'Compare buying against renting over the planned stay. ' +
      'Use when the user is deciding between buying and renting. Returns BUY, RENT or BORDERLINE with reasoning.',
    parameters: {
      type: 'object',
      properties: {
        property_price: { type: 'number', description: "Price of the property they're considering in AED" },
        monthly_rent: { type: 'number', description: 'Current or comparable monthly rent in AED' },
        years_staying: { type: 'integer', description: 'How many years they plan to stay in the UAE, at most 100' },
        down_payment_percent: { type: 'number', description: 'Down payment percent, minimum 20. Default: 20' },
        interest_rate: { type: 'number', description: 'Annual interest rate percent. Default: 4.5' },
        appreciation_percent: {
          type: 'number',
          description: 'Expected annual property appreciation percent. Default: 3',
        },
        rent_increase_percent: { type: 'number', description: 'Expected annual rent increase percent. Default: 5' },
      },
      required: ['property_price', 'monthly_rent', 'years_staying'],
    },
  },
  z.object({
    property_price: z.number(),
    monthly_rent: z.number(),
    years_staying: z.number(),
    down_payment_percent: optionalNumber,
    interest_rate: optionalNumber,
    appreciation_percent: optionalNumber,
    rent_increase_percent: optionalNumber,
  }),
  (args, engine) =>
    formatBuyVsRent(
      engine.compareBuyVsRent({
        propertyPrice: args.property_price,
        monthlyRent: args.monthly_rent,
        yearsStaying: args.years_staying,
        downPaymentPercent: args.down_payment_percent,
        annualRatePercent: args.interest_rate,
        appreciationPercent: args.appreciation_percent,
        rentIncreasePercent: args.rent_increase_percent,
      }),
      engine.policy.currency
    )
);

const checkEligibility = defineTool(
  {
    name: 'check_eligibility',
    description:
      'Check basic UAE mortgage eligibility. Returns eligibility status, issues to address and required documents.',
    parameters: {
      type: 'object',
      properties: {
        monthly_income: { type: 'number', description: 'Gross monthly income in AED' },
        nationality: {
          type: 'string',
          enum: ['expat', 'uae_national'],
          description: 'Residency status. Default: expat',
        },
        employment_type: {
          type: 'string',
          enum: ['salaried', 'self_employed', 'business_owner'],
          description: 'Employment type. Default: salaried',
        },
        years_in_uae: { type: 'number', description: 'Years of UAE residency' },
      },
      required: ['monthly_income'],
    },
  },
  z.object({
    monthly_income: z.number(),
    nationality: z.string().nullish(),
    employment_type: z.string().nullish(),
    years_in_uae: optionalNumber,
  }),
  (args, engine) =>
    formatEligibility(
      engine.validateEligibility({
        nationality: parseNationality(args.nationality),
        monthlyIncome: args.monthly_income,
        employmentType: parseEmploymentType(args.employment_type),
        yearsInUae: args.years_in_uae,
      })
    )
);

const getMortgageRules = defineTool(
  {
    name: 'get_mortgage_rules',
    description:
      'Get the key UAE mortgage rules: LTV limits, tenure, fees, rates and eligibility requirements. ' +
      'Use when asked about regulations or requirements.',
    parameters: { type: 'object', properties: {}, required: [] },
  },
  z.object({}),
  (_args, engine) => formatMortgageRules(engine.getRules())
);

function parseNationality(value: string | null | undefined): 'expat' | 'uae_national' {
  if (value === undefined || value === null || value === 'expat') return 'expat';
  if (value === 'uae_national') return 'uae_national';
  throw new InvalidInputError('nationality', "nationality must be 'expat' or 'uae_national'");
}

function parseEmploymentType(
  value: string | null | undefined
): 'salaried' | 'self_employed' | 'business_owner' | undefined {
  if (value === undefined || value === null) return undefined;
  if (value === 'salaried' || value === 'self_employed' || value === 'business_owner') return value;
  throw new InvalidInputError(
    'employment_type',
    "employment_type must be 'salaried', 'self_employed' or 'business_owner'"
  );
}

const TOOLS: readonly MortgageTool[] = [
  calculateMortgage,
  assessAffordability,
  compareBuyVsRent,
  checkEligibility,
  getMortgageRules,
];

// ============================================
// REGISTRY
// ============================================

export class ToolRegistry {
  private tools = new Map<string, MortgageTool>();

  constructor(private engine: MortgageEngine = getMortgageEngine()) {
    for (const tool of TOOLS) {
      this.tools.set(tool.definition.name, tool);
    }
  }

  definitions(): ToolDefinition[] {
    return TOOLS.map((tool) => tool.definition);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Run a tool with the raw JSON argument string the model produced.
   */
  execute(name: string, rawArguments: string): ToolResult {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, error: `Unknown tool: ${name}` };
    }

    let args: unknown;
    try {
      args = rawArguments.trim() === '' ? {} : JSON.parse(rawArguments);
    } catch {
      return { ok: false, error: `Arguments for ${name} are not valid JSON` };
    }

    try {
      return { ok: true, output: tool.run(args, this.engine) };
    } catch (error) {
      if (error instanceof InvalidInputError) {
        return { ok: false, error: `Invalid input for ${name}: ${error.message}` };
      }
      console.error(`[Tools] ${name} failed:`, error);
      return { ok: false, error: `${name} failed: ${error instanceof Error ? error.message : 'Unknown error'}` };
    }
  }
}
