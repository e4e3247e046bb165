declare namespace Express {
  export interface Request {
    /** Set by requireJWT once the bearer token checks out. */
    user?: import("../directory/users").AuthUser;
  }
}
