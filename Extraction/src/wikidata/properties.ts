// Wikidata property ids used by the harvester.

export const P_TRANSPORT_NETWORK = "P16";
export const P_CONNECTING_LINE = "P81";
export const P_ADJACENT_STATION = "P197";
export const P_PART_OF = "P361";
export const P_COMPLEX_COLOR = "P462";
export const P_COLOR = "P465";
export const P_HAS_PART = "P527";
export const P_TERMINUS = "P559";
export const P_END_TIME = "P582";
export const P_COORDINATES = "P625";
export const P_INTERCHANGE_STATION = "P833";
export const P_DATE_OF_OFFICIAL_OPENING = "P1619";

export const ITEM_PREFIX = "Q";
