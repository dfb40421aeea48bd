import mongoose from 'mongoose';

// Drops credentials from the URI before it reaches the log.
export const redactMongoUri = (mongoUri: string): string => mongoUri.replace(/\/\/([^@/]+)@/, '//***@');

export const connectDatabase = async (mongoUri: string): Promise<void> => {
  try {
    console.log(`\n${'='.repeat(60)}`);
    console.log(`🔧 MONGODB CONNECTION`);
    console.log(`${'='.repeat(60)}`);
    console.log(`MongoDB URI: ${redactMongoUri(mongoUri)}`);
    console.log(`${'='.repeat(60)}\n`);

    await mongoose.connect(mongoUri, {
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
      family: 4, // Use IPv4, skip trying IPv6
      maxPoolSize: 10,
      minPoolSize: 2,
    });

    mongoose.connection.on('error', (error) => {
      console.error('❌ MongoDB connection error:', error);
    });

    mongoose.connection.on('disconnected', () => {
      console.warn('⚠️ MongoDB disconnected');
    });
  } catch (error) {
    console.error('❌ Failed to connect to MongoDB:', error);
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  await mongoose.connection.close();
};
