declare namespace Express {
  export interface Request {
    authUser?: {
      id: string;
      role: "OPS_ADMIN" | "OPS_REVIEWER";
    };
  }
}
