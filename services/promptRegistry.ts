import type { AssetDescriptor, Resolution } from "../types/canvasTypes";
import { ASSET_TOOL_NAMES } from "./assetFanOut";

// --- PROMPT REGISTRY ---
// Contracts for the model-backed collaborators. Every layout prompt carries
// the same hard rules the validator enforces, so feedback rounds converge.

const LAYOUT_RULES = (resolution: Resolution) => `
  <layout_rules>
    - Canvas is exactly ${resolution[0]}x${resolution[1]}. Set top-level "width" and "height" to these values and "version" to "4.6.0".
    - Every element must sit fully inside the canvas: left >= 0, top >= 0, left + width*scaleX <= ${resolution[0]}, top + height*scaleY <= ${resolution[1]}.
    - Text elements use "type": "textbox" only. Never "text" or "i-text".
    - Gradients: {"type": "linear"|"radial", "coords": {...}, "colorStops": [{"offset": 0, "color": "#RRGGBB"}, ...]}. colorStops is an ARRAY sorted by offset, never an object keyed by offset.
    - Colors are "#RRGGBB" or "rgba(r,g,b,a)".
    - Textboxes never overlap each other; keep at least 40px vertical space between stacked text.
    - Images may sit under text; decorative rects may sit under images or text.
  </layout_rules>
`;

const describeAssets = (assets: readonly AssetDescriptor[]): string =>
    assets.length === 0
        ? 'No generated assets.'
        : assets.map((asset, i) => {
            const source = asset.url ? `url: ${asset.url}` : `inline content (${asset.content?.length ?? 0} chars)`;
            return `${i + 1}. ${asset.type} - ${source}${asset.description ? ` - ${asset.description}` : ''}`;
        }).join('\n');

export const PROMPTS = {
    ASSET_PLANNER: {
        ROLE: "Senior Creative Director",
        TASK: (brief: string, resolution: Resolution, hasProductImage: boolean) => `
      Plan the visual assets for a ${resolution[0]}x${resolution[1]} banner.
      DESIGN BRIEF: ${brief}
      PRODUCT IMAGE PROVIDED: ${hasProductImage ? 'Yes' : 'No'}

      AVAILABLE TOOLS: ${ASSET_TOOL_NAMES.join(', ')}
      - background_replacer only works when a product image is provided.
      - Asset prompts describe visuals only. No text inside generated images.

      Return a JSON ARRAY of 3-5 objects:
      [{"type": "background|illustration|decoration|font", "tool": "tool_name", "prompt": "...", "description": "...", "dimensions": {"width": W, "height": H}}]
      Output RAW JSON ONLY.
    `
    },

    COMPOSER: {
        ROLE: "Layout Composer",
        TASK: (brief: string, assets: readonly AssetDescriptor[], resolution: Resolution) => `
      Compose a canvas layout document for the banner described below.

      DESIGN BRIEF: ${brief}

      ASSETS (reference them by url in "image" elements):
      ${describeAssets(assets)}
      ${LAYOUT_RULES(resolution)}
      Output ONLY the JSON document: {"version": "4.6.0", "width": ..., "height": ..., "objects": [...]}.
      No preamble, no markdown fences.
    `
    },

    CRITIC: {
        ROLE: "Design Reviewer",
        TASK: (documentJson: string, brief: string, resolution: Resolution) => `
      Review this ${resolution[0]}x${resolution[1]} layout against the brief.
      It already passes structural validation; judge hierarchy, balance, contrast and legibility only.

      DESIGN BRIEF: ${brief}
      LAYOUT: ${documentJson}

      Reply with exactly one line:
      - "PASS" if the layout is ready to ship.
      - "CONTINUE: <specific, actionable changes>" otherwise.
    `
    },

    FEEDBACK_APPLIER: {
        ROLE: "Layout Reviser",
        TASK: (documentJson: string, feedback: string, brief: string, assets: readonly AssetDescriptor[], resolution: Resolution) => `
      Revise the layout document below. Apply the feedback and change nothing else.

      FEEDBACK:
      ${feedback}

      DESIGN BRIEF: ${brief}
      ASSETS:
      ${describeAssets(assets)}
      ${LAYOUT_RULES(resolution)}
      CURRENT LAYOUT: ${documentJson}

      Output ONLY the complete revised JSON document. No markdown.
    `
    }
};
