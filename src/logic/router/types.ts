import { RoutingLabel } from './routing-label';

export type AgentName = 'Compliance Agent' | 'History Agent' | 'Strategy Agent' | 'Analytics Agent' | 'System';

export type AgentResult = Readonly<{
    responseText: string;
    producingAgent: AgentName;
}>;

export type ClassificationResult =
    | { status: 'classified'; label: RoutingLabel; raw: string }
    | { status: 'unmatched'; label: RoutingLabel; raw: string }
    | { status: 'failed'; label: RoutingLabel; error: string };

export interface DocumentContext {
    studentId: string;
    fileName: string;
    text: string;
    updatedAt: Date;
}

/**
 * Everything a turn may read. Built fresh for each request and handed to the
 * router; agents never reach for global state.
 */
export interface SessionContext {
    userId: string;
    studentId?: string;
    document?: DocumentContext;
}

export interface RoutedTurn {
    classification: ClassificationResult;
    result: AgentResult;
}
