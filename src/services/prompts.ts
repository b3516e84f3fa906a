// ============================================================
// Gemini prompts — screening, refinement, analysis
// ============================================================
// Each prompt pins the exact JSON shape; schemas in gemini.ts
// validate the same shape on the way back.
// ============================================================

export const SCREENING_SYSTEM_PROMPT = `You review Google Street View images that were aimed at ONE target building.
Each image is labelled with its candidate_index and the camera parameters used to take it.

For EVERY image decide:
• is_valid_front_face — true only if the image shows the target building's main street-facing facade
  (entrance, storefront or front door side) from OUTSIDE. Side walls, back walls, interiors, tunnels,
  pictures dominated by a neighbouring building or by road surface are NOT valid.
• confidence — 0.0 to 1.0, how sure you are of that decision.
• clarity — one of "excellent", "good", "acceptable", "poor".
• needs_refinement — true if the roof line or the ground line is cut off, the building is too small,
  the road fills the lower third, or a neighbour competes for the centre of the frame.
• overall_quality — integer 1-10 rating of framing and visibility.
• is_full_view — true only if roof AND ground of the facade are both inside the frame with margin.
• is_target_building_primary — false if a NEIGHBOURING building is larger or more central in the frame
  than the building the camera is aimed at.
• is_road_dominated — true if road surface or traffic fills more than 30% of the lower half of the frame.
• building_coverage_pct — integer 0-100, share of the frame taken by the TARGET building only.
• group_id — a short label; give the SAME label to images that show the SAME facade from different spots.
• suggestions — one sentence on what is wrong or what would improve the framing.

Return ONLY JSON:
{
  "faces": [
    {
      "candidate_index": <int>,
      "is_valid_front_face": <bool>,
      "confidence": <float 0-1>,
      "clarity": "excellent"|"good"|"acceptable"|"poor",
      "needs_refinement": <bool>,
      "overall_quality": <int 1-10>,
      "is_full_view": <bool>,
      "is_target_building_primary": <bool>,
      "is_road_dominated": <bool>,
      "building_coverage_pct": <int 0-100>,
      "group_id": "<label>",
      "suggestions": "<text>"
    }
  ]
}`

export const REFINEMENT_SYSTEM_PROMPT = `You adjust Street View camera parameters so that the target building's front facade
is captured completely: roof line to ground line, both edges, signage readable.

You receive the current image, the camera parameters (heading, pitch, fov, distance to the building)
and the list of earlier attempts with their results.

Rules:
• Vertical completeness (roof AND ground visible) matters most; being closer is better once it holds.
• Roof cut off, ground visible → raise pitch (+5 to +15). Ground cut off → lower pitch (-5 to -15).
• Only a slice of the facade visible → move back (+5 to +10 m) and/or widen fov (+10).
• Building tiny in the frame → move closer (-5 to -10 m) or narrow fov.
• A neighbouring building creeping in → narrow fov by about 5 and do not widen it again.
• Never repeat parameters an earlier attempt already used; if a move overshot, go back half way.
• Limits per step: |distance_change| ≤ 10, |pitch_change| ≤ 15, |fov_change| ≤ 15.
• Absolute limits: distance 8-65 m, pitch -15..55, fov 30-90.
• If the framing is already right, return all changes as 0.

Return ONLY JSON:
{
  "distance_change": <float meters>,
  "pitch_change": <float degrees>,
  "fov_change": <float degrees>,
  "reasoning": "<one sentence>"
}`

export const ANALYSIS_SYSTEM_PROMPT = `You describe ONE building from a small set of Street View photos that all show it.
Other buildings at the frame edges or in the background are noise; ignore them.

Read every signboard on the target building (all floors, doors, windows, directory boards, any script;
transliterate non-Latin text to English). Never invent names you cannot read.

Return ONLY JSON:
{
  "building_usage_summary": "<one sentence on what the building is used for>",
  "building_type": "<e.g. Commercial, Residential, Mixed use, Institutional, Industrial>",
  "architectural_style": "<e.g. Modern glass-front commercial>",
  "condition": "<e.g. Well maintained, Weathered, Under construction>",
  "visual_description": {
    "estimated_floors": "<e.g. 3-4 floors>",
    "style": "<short style description>",
    "color": "<dominant colours>"
  },
  "establishments": [
    { "name": "<read from signboard>", "type": "<e.g. Pharmacy>", "description": "<one sentence>" }
  ]
}`
