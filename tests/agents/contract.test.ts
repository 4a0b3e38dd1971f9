import { expect } from 'chai';
import { describe, it } from 'mocha';
import { AgentFailure, AgentResult } from '../../src/agents/agentResult';
import { extractJsonText, parseModelResponse, toPlanFields } from '../../src/agents/contract';
import { modelReply } from '../helpers';

function valueOf<T>(result: AgentResult<T>): T {
    if (!result.ok) {
        throw new Error(`Expected success, got ${result.failure.kind}: ${result.failure.message}`);
    }
    return result.value;
}

function failureOf<T>(result: AgentResult<T>): AgentFailure {
    if (result.ok) {
        throw new Error('Expected a failure');
    }
    return result.failure;
}

describe('Planning model contract', () => {
    describe('extractJsonText', () => {
        it('should strip a json code fence', () => {
            expect(extractJsonText('```json\n{"a": 1}\n```')).to.equal('{"a": 1}');
        });

        it('should strip a bare code fence', () => {
            expect(extractJsonText('Here:\n```\n{"a": 1}\n```\nDone')).to.equal('{"a": 1}');
        });

        it('should return unfenced text trimmed', () => {
            expect(extractJsonText('  {"a": 1}\n')).to.equal('{"a": 1}');
        });
    });

    describe('parseModelResponse', () => {
        it('should accept a well-formed reply and normalize priorities', () => {
            const response = valueOf(parseModelResponse(modelReply()));

            expect(response.reasoning_chain).to.have.length(1);
            expect(response.business_plan.actions[0].priority).to.equal('HIGH');
        });

        it('should default missing dependencies and scenarios to empty lists', () => {
            const raw = JSON.stringify({
                reasoning_chain: [{ observation: 'o', thought: 't' }],
                business_plan: {
                    title: 'T',
                    summary: 'S',
                    actions: [{ description: 'd', priority: 'Low', impact: {}, timeline: 'now' }],
                    metrics: {},
                },
            });

            const response = valueOf(parseModelResponse(raw));

            expect(response.business_plan.actions[0].dependencies).to.deep.equal([]);
            expect(response.business_plan.actions[0].priority).to.equal('LOW');
            expect(response.business_plan.what_if_scenarios).to.deep.equal([]);
            expect(response.reasoning_chain[0].action).to.be.undefined;
        });

        it('should accept a reply wrapped in a code fence', () => {
            const response = valueOf(parseModelResponse('```json\n' + modelReply({ title: 'Fenced' }) + '\n```'));
            expect(response.business_plan.title).to.equal('Fenced');
        });

        it('should report malformed JSON as a contract violation', () => {
            const failure = failureOf(parseModelResponse('not json at all'));

            expect(failure.kind).to.equal('upstream_contract_violation');
            expect(failure.message.startsWith('Model response is not valid JSON: ')).to.be.true;
        });

        it('should list the paths of missing fields', () => {
            const raw = JSON.stringify({ reasoning_chain: [], business_plan: { summary: 'S', actions: [], metrics: {} } });

            const failure = failureOf(parseModelResponse(raw));

            expect(failure.kind).to.equal('upstream_contract_violation');
            if (failure.kind === 'upstream_contract_violation') {
                expect(failure.issues).to.deep.equal(['business_plan.title: Required']);
            }
            expect(failure.message).to.equal('Model response does not match the planning contract: business_plan.title: Required');
        });

        it('should reject probabilities outside [0, 1]', () => {
            const raw = modelReply({
                scenarios: [{ description: 'd', assumptions: {}, impact_areas: [], probability: 1.5 }],
            });

            const failure = failureOf(parseModelResponse(raw));

            expect(failure.message).to.contain('business_plan.what_if_scenarios.0.probability: Number must be less than or equal to 1');
        });

        it('should reject unknown priorities', () => {
            const raw = modelReply().replace('"high"', '"urgent"');

            const failure = failureOf(parseModelResponse(raw));

            expect(failure.message).to.contain('business_plan.actions.0.priority: ');
        });

        it('should reject a reply that is not an object', () => {
            const failure = failureOf(parseModelResponse('[1, 2]'));
            expect(failure.message).to.equal('Model response does not match the planning contract: (root): Expected object, received array');
        });
    });

    describe('toPlanFields', () => {
        it('should map snake_case model fields onto plan fields', () => {
            const response = valueOf(parseModelResponse(modelReply({
                scenarios: [{ description: 'Rain', assumptions: { mm: 30 }, impact_areas: ['sales'], probability: 0.3 }],
            })));

            const fields = toPlanFields(response.business_plan);

            expect(fields.title).to.equal('Growth Plan');
            expect(fields.actions[0]).to.deep.equal({
                description: 'Launch promotion', priority: 'HIGH', impact: { revenue: '+5%' }, dependencies: [], timeline: 'Q3',
            });
            expect(fields.whatIfScenarios).to.deep.equal([
                { description: 'Rain', assumptions: { mm: 30 }, impactAreas: ['sales'], probability: 0.3 },
            ]);
        });
    });
});
