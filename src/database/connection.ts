import mongoose from "mongoose";
import { dbLogger } from "../utils/logger";

export interface DatabaseSettings {
  mongoUri: string;
  mongoDbName: string | undefined;
}

export const connectDatabase = async (settings: DatabaseSettings): Promise<void> => {
  try {
    await mongoose.connect(
      settings.mongoUri,
      settings.mongoDbName ? { dbName: settings.mongoDbName } : {}
    );
    dbLogger.info("Connected to MongoDB successfully");
  } catch (error) {
    dbLogger.error("MongoDB connection failed", {
      error: error instanceof Error ? error.message : error,
    });
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  try {
    await mongoose.disconnect();
    dbLogger.info("Disconnected from MongoDB");
  } catch (error) {
    dbLogger.error("Error disconnecting from MongoDB", {
      error: error instanceof Error ? error.message : error,
    });
  }
};
