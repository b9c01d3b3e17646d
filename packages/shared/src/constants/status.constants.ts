// ============================================================================
// Status Registry — Constants
// ============================================================================

// --- Clinical Categories ---
// Presentation grouping only; a status's category has no effect on recording.

export const StatusCategory = {
  HARD_TISSUE: 'hard_tissue',
  PULPAL_PERIAPICAL: 'pulpal_periapical',
  PERIODONTAL: 'periodontal',
  SOFT_TISSUE: 'soft_tissue',
  OTHER: 'other',
} as const;

export type StatusCategory = (typeof StatusCategory)[keyof typeof StatusCategory];

export const STATUS_CATEGORIES = [
  StatusCategory.HARD_TISSUE,
  StatusCategory.PULPAL_PERIAPICAL,
  StatusCategory.PERIODONTAL,
  StatusCategory.SOFT_TISSUE,
  StatusCategory.OTHER,
] as const;

export const STATUS_CATEGORY_LABELS: Readonly<Record<StatusCategory, string>> =
  Object.freeze({
    hard_tissue: 'Hard Tissue',
    pulpal_periapical: 'Pulpal / Periapical',
    periodontal: 'Periodontal',
    soft_tissue: 'Soft Tissue',
    other: 'Other',
  });

// --- Defaults ---

export const DEFAULT_STATUS_CODE = 'normal';

/** Colour used for codes the registry cannot describe. */
export const FALLBACK_STATUS_COLOR = '#808080';

export const STATUS_CODE_PATTERN = /^[a-z][a-z0-9_]{1,49}$/;

export const STATUS_COLOR_PATTERN = /^#[0-9a-fA-F]{6}$/;

// --- Built-in Statuses ---

export interface BuiltInStatus {
  readonly code: string;
  readonly displayName: string;
  readonly color: string;
  readonly category: StatusCategory;
}

export const BUILTIN_STATUSES: readonly BuiltInStatus[] = Object.freeze([
  // Hard tissue
  { code: 'caries_incipient', displayName: 'Caries (Incipient)', color: '#F1C40F', category: StatusCategory.HARD_TISSUE },
  { code: 'caries_moderate', displayName: 'Caries (Moderate)', color: '#F39C12', category: StatusCategory.HARD_TISSUE },
  { code: 'caries_deep', displayName: 'Caries (Deep)', color: '#E74C3C', category: StatusCategory.HARD_TISSUE },
  { code: 'fracture', displayName: 'Fracture', color: '#FF0000', category: StatusCategory.HARD_TISSUE },
  { code: 'wear', displayName: 'Wear / Attrition', color: '#BDB76B', category: StatusCategory.HARD_TISSUE },
  { code: 'enamel_defect', displayName: 'Enamel Defect', color: '#C71585', category: StatusCategory.HARD_TISSUE },
  { code: 'filling', displayName: 'Filling', color: '#95A5A6', category: StatusCategory.HARD_TISSUE },
  { code: 'defective_restoration', displayName: 'Defective Restoration', color: '#CD853F', category: StatusCategory.HARD_TISSUE },
  { code: 'crown', displayName: 'Crown', color: '#3498DB', category: StatusCategory.HARD_TISSUE },
  { code: 'bridge_abutment', displayName: 'Bridge Abutment', color: '#6495ED', category: StatusCategory.HARD_TISSUE },
  { code: 'bridge_pontic', displayName: 'Bridge Pontic', color: '#87CEEB', category: StatusCategory.HARD_TISSUE },
  { code: 'implant', displayName: 'Implant', color: '#9B59B6', category: StatusCategory.HARD_TISSUE },
  { code: 'extracted', displayName: 'Extracted', color: '#2C3E50', category: StatusCategory.HARD_TISSUE },
  { code: 'missing', displayName: 'Missing', color: '#34495E', category: StatusCategory.HARD_TISSUE },
  { code: 'impacted', displayName: 'Impacted', color: '#A9A9A9', category: StatusCategory.HARD_TISSUE },

  // Pulpal / periapical
  { code: 'toothache', displayName: 'Toothache', color: '#FF6F61', category: StatusCategory.PULPAL_PERIAPICAL },
  { code: 'sensitivity', displayName: 'Sensitivity', color: '#FFFF00', category: StatusCategory.PULPAL_PERIAPICAL },
  { code: 'pulpitis', displayName: 'Pulpitis', color: '#FF69B4', category: StatusCategory.PULPAL_PERIAPICAL },
  { code: 'necrotic_pulp', displayName: 'Necrotic Pulp', color: '#8B0000', category: StatusCategory.PULPAL_PERIAPICAL },
  { code: 'periapical_lesion', displayName: 'Periapical Lesion', color: '#B22222', category: StatusCategory.PULPAL_PERIAPICAL },
  { code: 'abscess', displayName: 'Abscess', color: '#DC143C', category: StatusCategory.PULPAL_PERIAPICAL },
  { code: 'root_canal', displayName: 'Root Canal Treatment', color: '#E91E63', category: StatusCategory.PULPAL_PERIAPICAL },

  // Periodontal
  { code: 'gingivitis', displayName: 'Gingivitis', color: '#FF6347', category: StatusCategory.PERIODONTAL },
  { code: 'periodontitis', displayName: 'Periodontitis', color: '#B03A2E', category: StatusCategory.PERIODONTAL },
  { code: 'gum_recession', displayName: 'Gum Recession', color: '#F08080', category: StatusCategory.PERIODONTAL },
  { code: 'mobility', displayName: 'Mobility', color: '#CD5C5C', category: StatusCategory.PERIODONTAL },
  { code: 'bone_loss', displayName: 'Bone Loss', color: '#800000', category: StatusCategory.PERIODONTAL },

  // Soft tissue
  { code: 'swelling', displayName: 'Swelling', color: '#FFA07A', category: StatusCategory.SOFT_TISSUE },
  { code: 'ulcer', displayName: 'Ulcer', color: '#DB7093', category: StatusCategory.SOFT_TISSUE },
  { code: 'bleeding_gums', displayName: 'Bleeding Gums', color: '#C0392B', category: StatusCategory.SOFT_TISSUE },

  // Other
  { code: 'normal', displayName: 'Normal', color: '#FFFFFF', category: StatusCategory.OTHER },
  { code: 'treatment_planned', displayName: 'Treatment Planned', color: '#00CED1', category: StatusCategory.OTHER },
  { code: 'observation', displayName: 'Under Observation', color: '#40E0D0', category: StatusCategory.OTHER },
]);
