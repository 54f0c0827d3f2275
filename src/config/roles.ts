import type { RoleTable } from "@/types";

// Role codes as they appear in the board's placement data.
export const START_CODE = 12;
export const MIDDLE_CODE = 13;
export const FINISH_CODE = 14;
export const FOOT_CODE = 15;

export const DEFAULT_ROLE_TABLE: RoleTable = {
  roles: {
    [START_CODE]: { role: "start", color: "#00DD00" },
    [MIDDLE_CODE]: { role: "middle", color: "#00FFFF" },
    [FINISH_CODE]: { role: "finish", color: "#FF00FF" },
    [FOOT_CODE]: { role: "foot", color: "#FFA500" },
  },
  defaultCode: MIDDLE_CODE,
  fallbackColor: "#00FFFF",
};
