/**
 * Churchbooks CLI - Core Types
 */

export interface GlobalOptions {
    workspace?: string;
    yes: boolean;
}

export interface TransactionOptions extends GlobalOptions {
    id?: string;
    date?: string;
    category?: string;
    subhead?: string;
    debit?: string;
    credit?: string;
    user?: string;
}

export interface FilterOptions extends GlobalOptions {
    user?: string;
    from?: string;
    to?: string;
    category?: string;
    subhead?: string;
}

export interface ReportOptions extends FilterOptions {
    csv?: string;
    xlsx?: string;
    pdf?: string;
}

export interface InitOptions {
    directory: string;
    organization?: string;
}

export interface Workspace {
    root: string;
    configPath: string;
    outputs: string;
}
