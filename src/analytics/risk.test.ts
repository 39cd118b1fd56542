import { describe, it, expect } from 'vitest';
import { assessPricingRisk, simulateMarketScenarios } from './risk.js';

describe('assessPricingRisk', () => {
  it('flags missing competitor data', () => {
    const result = assessPricingRisk(100, []);
    expect(result.overallRisk).toBe('medium');
    expect(result.risks.map((r) => r.description)).toEqual(['Limited competitive intelligence']);
  });

  it('flags a premium above 120% of the competitor average', () => {
    // avg = 100, 125 > 120
    const result = assessPricingRisk(125, [90, 110]);
    expect(result.overallRisk).toBe('high');
    expect(result.risks[0]).toEqual({
      riskType: 'positioning',
      description: 'Significant premium over competition',
      impactLevel: 'high',
      probability: 'medium',
      mitigationStrategy: 'Ensure clear value differentiation',
    });
  });

  it('flags undercutting below 80% of the competitor average', () => {
    const result = assessPricingRisk(75, [100, 100]);
    expect(result.risks.map((r) => r.riskType)).toEqual(['competitive_response']);
    expect(result.overallRisk).toBe('medium');
  });

  it('adds strategy-specific risks', () => {
    expect(assessPricingRisk(100, [100], 'premium').risks.map((r) => r.riskType)).toEqual(['brand']);
    expect(assessPricingRisk(100, [100], 'penetration').risks.map((r) => r.riskType)).toEqual(['margin']);
  });

  it('is low risk inside the band with a neutral strategy', () => {
    expect(assessPricingRisk(105, [100, 110], 'competitive')).toEqual({ overallRisk: 'low', risks: [] });
  });
});

describe('simulateMarketScenarios', () => {
  it('projects base, optimistic and pessimistic revenue', () => {
    const scenarios = simulateMarketScenarios(100, 1000);
    expect(scenarios.map((s) => s.scenarioName)).toEqual(['Base Case', 'Optimistic', 'Pessimistic']);
    expect(scenarios.map((s) => s.revenueProjection)).toEqual([100000, 136500, 63000]);
    expect(scenarios.reduce((p, s) => p + s.probability, 0)).toBeCloseTo(1, 10);
  });
});
