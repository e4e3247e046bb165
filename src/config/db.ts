import mongoose from "mongoose";
import env from "./env";

// Prevent query buffering (critical)
mongoose.set("bufferCommands", false);
mongoose.set("strictQuery", true);

let connection: Promise<typeof mongoose> | null = null;

/**
 * Connect once and reuse. Acceptance runs in a transaction, so the
 * deployment must be a replica set (a single-node one is enough).
 */
export async function connectDB() {
  if (!connection) {
    connection = mongoose.connect(env.MONGO_URI, {
      dbName: env.DB_NAME,
      serverSelectionTimeoutMS: 5000,
    });
  }
  try {
    return await connection;
  } catch (err) {
    connection = null;
    throw err;
  }
}

export async function disconnectDB() {
  if (!connection) return;
  connection = null;
  await mongoose.disconnect();
}
