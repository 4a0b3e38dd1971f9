import { BusinessPlan } from './types';

function formatValue(value: unknown): string {
    return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Formats a probability in [0, 1] as a percentage number, keeping one decimal
 * for whole values (0.5 -> "50.0").
 */
export function formatPercentage(probability: number): string {
    const percentage = probability * 100;
    return Number.isInteger(percentage) ? percentage.toFixed(1) : String(percentage);
}

/**
 * Renders a plan as markdown: title, executive summary, one section per action,
 * key metrics and, when there are any, the what-if scenarios.
 */
export function renderPlanMarkdown(plan: BusinessPlan): string {
    let md = `# ${plan.title}\n## Executive Summary\n${plan.summary}\n## Action Plan\n`;

    for (const action of plan.actions) {
        md += `### ${action.description}\n`;
        md += `- **Priority:** ${action.priority}\n`;
        md += `- **Timeline:** ${action.timeline}\n`;
        md += `- **Status:** ${action.status}\n`;
        md += `- **Impact:**\n`;
        for (const [area, impact] of Object.entries(action.impact)) {
            md += `  - ${area}: ${formatValue(impact)}\n`;
        }
        md += '\n';
    }

    md += '## Key Metrics\n';
    for (const [metric, value] of Object.entries(plan.metrics)) {
        md += `- **${metric}:** ${formatValue(value)}\n`;
    }

    if (plan.whatIfScenarios.length > 0) {
        md += '\n## What-If Analysis\n';
        for (const scenario of plan.whatIfScenarios) {
            md += `### Scenario: ${scenario.description}\n`;
            md += `- **Probability:** ${formatPercentage(scenario.probability)}%\n`;
            md += `- **Impact Areas:** ${scenario.impactAreas.join(', ')}\n`;
            md += `- **Assumptions:**\n`;
            for (const [assumption, value] of Object.entries(scenario.assumptions)) {
                md += `  - ${assumption}: ${formatValue(value)}\n`;
            }
            md += '\n';
        }
    }

    return md;
}
