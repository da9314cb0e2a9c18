/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults, then applies
 * environment overrides.
 */

import type { Config } from './schema.js';

/**
 * Default configuration
 * Local-first: the embedding model is served by Ollama, with the
 * deterministic hash encoder taking over whenever it is unreachable.
 */
export const DEFAULT_CONFIG: Config = {
  embedding: {
    provider: 'ollama',
    model: 'all-minilm',  // 384 dimensions
    dimensions: 384,
    batch_size: 32,
    timeout_ms: 120000,
    max_tokens: 512,
  },

  chunking: {
    chunk_size: 512,
    chunk_overlap: 64,
    overlap_sentences: 2,
    overlap_lines: 2,
    locale: 'en',
  },

  context: {
    max_tokens: 4096,
  },

  // Relative paths resolve against the lantern directory
  index: {
    path: 'vector_index.hnsw',
    m: 16,
    ef_construction: 200,
    ef_search: 100,
    snapshot_every: 256,
  },

  search: {
    top_k: 5,
  },

  indexing: {
    ignore_patterns: [],
    max_file_size: 500 * 1024,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.lantern/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Lantern Configuration
# Location: ~/.lantern/config.toml (or $LANTERN_HOME/config.toml)
#
# Environment variables override this file:
#   EMBEDDING_MODEL, EMBEDDING_DIM, CHUNK_SIZE, CHUNK_OVERLAP,
#   MAX_CONTEXT_TOKENS, INDEX_FILE, OLLAMA_HOST

# Embedding Settings
# provider = "ollama" uses the model below; when Ollama is not reachable
# the deterministic hash encoder is used instead.
# provider = "hash" always uses the hash encoder.
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
max_tokens = ${DEFAULT_CONFIG.embedding.max_tokens}

# Chunking Settings (characters)
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}
overlap_sentences = ${DEFAULT_CONFIG.chunking.overlap_sentences}
overlap_lines = ${DEFAULT_CONFIG.chunking.overlap_lines}
locale = "${DEFAULT_CONFIG.chunking.locale}"

# Conversation context budget (tokens)
[context]
max_tokens = ${DEFAULT_CONFIG.context.max_tokens}

# Vector Index Settings
# Changing dimensions requires re-ingesting: an index built with a
# different dimension is discarded on load.
[index]
path = "${DEFAULT_CONFIG.index.path}"
m = ${DEFAULT_CONFIG.index.m}
ef_construction = ${DEFAULT_CONFIG.index.ef_construction}
ef_search = ${DEFAULT_CONFIG.index.ef_search}
snapshot_every = ${DEFAULT_CONFIG.index.snapshot_every}

# Search Settings
[search]
top_k = ${DEFAULT_CONFIG.search.top_k}

# Directory ingestion
[indexing]
# ignore_patterns = ["*.tmp", "scratch/"]
# max_file_size = 512000
`;
