import { ReActChainSnapshot } from './types';

export type ReasoningNodeKind = 'Observation' | 'Thought' | 'Action' | 'Result';

export interface ReasoningGraphNode {
    id: string;
    label: ReasoningNodeKind;
    /** Full text of the step part, shown on hover by clients. */
    title: string;
    color: string;
}

export interface ReasoningGraphEdge {
    from: string;
    to: string;
    color: string;
}

export interface ReasoningGraph {
    nodes: ReasoningGraphNode[];
    edges: ReasoningGraphEdge[];
}

const NODE_COLORS: Record<ReasoningNodeKind, string> = {
    Observation: '#90CAF9',
    Thought: '#A5D6A7',
    Action: '#FFCC80',
    Result: '#EF9A9A',
};

const EDGE_COLOR = '#90A4AE';

/**
 * Turns a reasoning chain into a directed graph with one
 * Observation -> Thought -> Action -> Result path per step.
 * A step without an action stops at its thought; a result is only drawn after an action.
 */
export function buildReasoningGraph(snapshot: ReActChainSnapshot): ReasoningGraph {
    const graph: ReasoningGraph = { nodes: [], edges: [] };

    const addNode = (id: string, label: ReasoningNodeKind, title: string) => {
        graph.nodes.push({ id, label, title, color: NODE_COLORS[label] });
    };
    const addEdge = (from: string, to: string) => {
        graph.edges.push({ from, to, color: EDGE_COLOR });
    };

    for (const step of snapshot.steps) {
        const obsId = `Obs_${step.id}`;
        const thoughtId = `Think_${step.id}`;
        addNode(obsId, 'Observation', step.observation);
        addNode(thoughtId, 'Thought', step.thought);
        addEdge(obsId, thoughtId);

        if (!step.action) {
            continue;
        }
        const actionId = `Act_${step.id}`;
        addNode(actionId, 'Action', step.action);
        addEdge(thoughtId, actionId);

        if (step.result) {
            const resultId = `Result_${step.id}`;
            addNode(resultId, 'Result', step.result);
            addEdge(actionId, resultId);
        }
    }

    return graph;
}
