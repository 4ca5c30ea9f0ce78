/** Cycles with at most this many modules are reported as direct */
export const DIRECT_CYCLE_MAX_LENGTH = 3;
/** Blast radius above which a change is flagged for extra scrutiny */
export const DEFAULT_ESCALATION_THRESHOLD = 20;
/** Consecutive gate failures before the next run is halted */
export const DEFAULT_FAILURE_THRESHOLD = 3;
/** Character budget of the primary profile document and of each module map */
export const DEFAULT_PROFILE_BUDGET = 2400;
export const MAX_MODULE_MAPS = 3;

/**
 * Per-section item caps for the profile
 */
export interface ProfileSlots {
    examples_per_category: number;
    directories: number;
    key_files: number;
    data_models: number;
    model_fields: number;
    routes: number;
    routes_per_file: number;
    module_dependencies: number;
    cycles: number;
}

export interface CheckCommandConfig {
    enabled: boolean;
    /** Explicit command; auto-detected when empty */
    command?: string;
    timeout: number;
}

/**
 * Configuration schema for repogenome
 */
export interface AnalyzerConfig {
    walker: {
        exclude_dirs: string[];
        include_extensions: string[];
        max_file_size: number;
        follow_symlinks: boolean;
    };
    graph: {
        /** Specifier prefix -> root-relative replacement */
        alias_prefixes: Record<string, string>;
        include_tests: boolean;
        max_unresolved_samples: number;
    };
    impact: {
        max_depth: number | null;
        escalation_threshold: number;
        direct_cycle_max_length: number;
    };
    gate: {
        failure_threshold: number;
        state_file: string;
        lint: CheckCommandConfig;
        test: CheckCommandConfig;
    };
    profile: {
        budget_chars: number;
        max_module_maps: number;
        min_module_files: number;
        output_dir: string;
        slots: ProfileSlots;
    };
    output: {
        verbose: boolean;
    };
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: AnalyzerConfig = {
    walker: {
        exclude_dirs: [
            '.git',
            '.hg',
            '.svn',
            '.next',
            '.nuxt',
            '.venv',
            'venv',
            '.idea',
            '.vscode',
            '.cache',
            '.turbo',
            '.repogenome',
            'node_modules',
            'vendor',
            'dist',
            'build',
            'out',
            'target',
            'coverage',
            '__pycache__',
            '.pytest_cache',
            '.mypy_cache',
        ],
        include_extensions: [
            '.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.py', '.go', '.java', '.rb', '.php', '.cs', '.rs',
            '.vue', '.svelte', '.prisma', '.json', '.yml', '.yaml', '.md',
            '.css', '.scss', '.sass', '.less', '.styl', '.pcss', '.html', '.sql', '.sh',
        ],
        max_file_size: 1024 * 1024,
        follow_symlinks: true,
    },
    graph: {
        alias_prefixes: {
            '@/': '',
            '~/': '',
            'src/': 'src/',
        },
        include_tests: false,
        max_unresolved_samples: 20,
    },
    impact: {
        max_depth: null,
        escalation_threshold: DEFAULT_ESCALATION_THRESHOLD,
        direct_cycle_max_length: DIRECT_CYCLE_MAX_LENGTH,
    },
    gate: {
        failure_threshold: DEFAULT_FAILURE_THRESHOLD,
        state_file: '.repogenome/state/gate_state.json',
        lint: { enabled: true, timeout: 120000 },
        test: { enabled: true, timeout: 300000 },
    },
    profile: {
        budget_chars: DEFAULT_PROFILE_BUDGET,
        max_module_maps: MAX_MODULE_MAPS,
        min_module_files: 3,
        output_dir: '.repogenome',
        slots: {
            examples_per_category: 2,
            directories: 12,
            key_files: 10,
            data_models: 20,
            model_fields: 6,
            routes: 15,
            routes_per_file: 5,
            module_dependencies: 12,
            cycles: 8,
        },
    },
    output: {
        verbose: false,
    },
};
