// configs/database.config.ts
import mongoose from "mongoose";
import type { Keys } from "@configs/dotenv.config";
import { Counter } from "@models/counter.model";
import { Feedback } from "@models/feedback.model";
import { NetworkLog } from "@models/network-log.model";
import { User } from "@models/user.model";
import { MongoRecordStore } from "@services/storage/mongo-record.store";
import type { DurableBackend, RecordStore } from "@services/storage/storage.types";
import { logger } from "@utils/logger";

interface DatabaseConfig {
  uri: string;
  options: mongoose.ConnectOptions;
}

/**
 * 📊 Connection Pool Settings
 */
export const getDatabaseConfig = (keys: Keys): DatabaseConfig => {
  const options: mongoose.ConnectOptions = {
    dbName: keys.mongoDBName,

    // 🏊‍♂️ Connection Pool Configuration
    maxPoolSize: keys.mongoMaxPoolSize,
    minPoolSize: 1,
    maxIdleTimeMS: 30000,     // Close connection after 30s idle

    // The startup probe fails after this long
    serverSelectionTimeoutMS: keys.mongoServerSelectionTimeoutMS,
    connectTimeoutMS: keys.mongoServerSelectionTimeoutMS,
    socketTimeoutMS: 45000,

    // 🛡️ Reliability
    retryWrites: true,
    retryReads: true,
  };

  return { uri: keys.mongoURI, options };
};

/**
 * 🔌 MongoDB connection manager, probed once by the persistence gateway.
 */
export class MongoBackend implements DurableBackend {
  private isConnected = false;

  constructor(private readonly config: DatabaseConfig) {}

  static fromKeys(keys: Keys): MongoBackend | null {
    return keys.mongoURI ? new MongoBackend(getDatabaseConfig(keys)) : null;
  }

  /**
   * 🚀 Connect, then make sure the unique indexes exist.
   */
  async probe(): Promise<boolean> {
    try {
      this.setupEventListeners();

      logger.info('🔄 Connecting to MongoDB...');
      await mongoose.connect(this.config.uri, this.config.options);
      await Promise.all([User.init(), Feedback.init(), NetworkLog.init(), Counter.init()]);

      this.isConnected = true;
      logger.info('✅ MongoDB Connected Successfully:');
      logger.info(`   - Database: ${mongoose.connection.name}`);
      logger.info(`   - Host: ${mongoose.connection.host}:${mongoose.connection.port}`);
      return true;
    } catch (error) {
      logger.error('❌ MongoDB connection failed:', error);
      await mongoose.disconnect().catch((disconnectError: unknown) => {
        logger.warn('⚠️ Could not release MongoDB client after failed probe:', disconnectError);
      });
      return false;
    }
  }

  createStore(): RecordStore {
    return new MongoRecordStore();
  }

  /**
   * 🎯 Connection state listeners
   */
  private setupEventListeners(): void {
    const connection = mongoose.connection;

    connection.on('disconnected', () => {
      logger.warn('🔌 MongoDB disconnected');
      this.isConnected = false;
    });

    connection.on('reconnected', () => {
      logger.info('🔄 MongoDB reconnected');
      this.isConnected = true;
    });

    connection.on('error', (error) => {
      logger.error('❌ MongoDB connection error:', error);
    });
  }

  /**
   * 🏥 Health check for monitoring systems
   */
  async ping(): Promise<boolean> {
    if (!this.isConnected || !mongoose.connection.db) return false;
    try {
      await mongoose.connection.db.admin().ping();
      return true;
    } catch (error) {
      logger.warn('💔 MongoDB ping failed:', error);
      return false;
    }
  }

  /**
   * 🔌 Graceful disconnect
   */
  async close(): Promise<void> {
    if (mongoose.connection.readyState === mongoose.ConnectionStates.disconnected) return;
    logger.info('🔌 Closing MongoDB connection...');
    await mongoose.connection.close();
    this.isConnected = false;
    logger.info('✅ MongoDB connection closed gracefully');
  }
}
