import {
  GENERATED_AT_SENTINEL,
  PASS1_REPO_INDEX_SCHEMA_VERSION,
  PASS2_ARCH_PACK_SCHEMA_VERSION,
  PASS2_LLM_RAW_FILENAME,
  PASS2_SEMANTIC_SCHEMA_VERSION,
  PASS2_SUPPORT_PACK_SCHEMA_VERSION,
} from "../../constants";

const repo = {
  repo_url: "https://example.com/acme/shop.git",
  resolved_commit: "3f1c2b9e0d7a4c5b8e6f1a2d3c4b5a697887a6b5",
};

export const archPackSample = {
  schema_version: PASS2_ARCH_PACK_SCHEMA_VERSION,
  generated_at: "2026-02-26T00:00:00.000Z",
  repo,
  caps: {
    max_arch_files: 120,
    max_arch_input_chars: 240000,
    max_arch_chars_per_file: 9000,
    pack_dep_hops: 1,
    pack_max_dep_edges_per_file: 12,
  },
  selection_debug: {
    available_files: 3,
    closure_seeds_count: 0,
    read_plan_count: 1,
    entrypoints_count: 1,
    spines_count: 1,
    dep_hops: 1,
    dep_edges_per_file: 12,
    expanded_count: 3,
  },
  files: {
    "README.md": "# Shop\n\nA small storefront.\n",
    "backend/main.py": "from backend.routers import orders\n\napp = create_app()\n",
    "backend/routers/orders.py": "def list_orders():\n    return []\n",
  },
  fingerprint_sha256: "0b8c6f1e4d2a3b5c7e9f0a1b2c3d4e5f60718293a4b5c6d7e8f90a1b2c3d4e5f",
};

export const supportPackSample = {
  schema_version: PASS2_SUPPORT_PACK_SCHEMA_VERSION,
  generated_at: "2026-02-26T00:00:00.000Z",
  repo,
  caps: {
    max_support_files: 28,
    max_support_chars: 120000,
    max_support_chars_per_file: 9000,
  },
  files: {
    "README.md": "# Shop\n\nA small storefront.\n",
  },
  fingerprint_sha256: "1c9d7a2f5e3b4c6d8f0a1b2c3d4e5f60718293a4b5c6d7e8f90a1b2c3d4e5f6a",
};

export const pass2SemanticSample = {
  schema_version: PASS2_SEMANTIC_SCHEMA_VERSION,
  generated_at: "2026-02-26T00:00:01.000Z",
  repo,
  caps: {
    onboarding_enabled: true,
    model: "gpt-4.1-mini",
    max_output_tokens: 2000,
    max_arch_input_chars: 240000,
    max_arch_files: 120,
    max_arch_chars_per_file: 9000,
    max_support_files: 28,
    max_support_chars: 120000,
    max_support_chars_per_file: 9000,
    pack_dep_hops: 1,
    pack_max_dep_edges_per_file: 12,
  },
  inputs: {
    pass1_repo_index_schema_version: PASS1_REPO_INDEX_SCHEMA_VERSION,
    pass1_repo_index_fingerprint_sha256: "2d0e8b3a6f4c5d7e9a1b2c3d4e5f60718293a4b5c6d7e8f90a1b2c3d4e5f6a7b",
    arch_pack_fingerprint_sha256: archPackSample.fingerprint_sha256,
    support_pack_fingerprint_sha256: supportPackSample.fingerprint_sha256,
  },
  llm_output: {
    schema_version: PASS2_SEMANTIC_SCHEMA_VERSION,
    generated_at: GENERATED_AT_SENTINEL,
    repo,
    summary: {
      primary_stack: "Python (FastAPI)",
      architecture_overview: "Single FastAPI service exposing order endpoints.",
      key_components: ["backend/main.py: app factory", "backend/routers/orders.py: order routes"],
      data_flows: ["HTTP request -> router -> in-memory list"],
      auth_and_routing_notes: ["No authentication middleware found."],
      risks_or_gaps: ["No persistence layer."],
    },
    evidence: {
      arch_pack_paths: ["backend/main.py", "backend/routers/orders.py"],
      support_pack_paths: ["README.md"],
      notable_files: [{ path: "backend/main.py", why: "Application entry point." }],
    },
  },
  llm_raw_paths: {
    raw_text: PASS2_LLM_RAW_FILENAME,
    repaired_text: null,
  },
  fingerprint_sha256: "3e1f9c4b7a5d6e8f0b2c3d4e5f60718293a4b5c6d7e8f90a1b2c3d4e5f6a7b8c",
};
