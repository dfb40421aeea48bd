import Question from '../models/Question';
import Category from '../models/Category';
import { setSequence } from '../models/Counter';
import { QUESTION_SEQUENCE } from '../repositories/triviaRepository';
import { loadConfigFromEnvFile } from '../config';
import { connectDatabase, disconnectDatabase } from '../config/database';
import { DEFAULT_FIXTURE_PATH, loadFixture } from './triviaFixture';

// Usage: seedTrivia.ts [fixture.json]
async function seedDatabase() {
  const config = loadConfigFromEnvFile();

  try {
    const fixture = loadFixture(process.argv[2] ?? DEFAULT_FIXTURE_PATH);

    await connectDatabase(config.mongoUri);
    console.log('Connected to MongoDB');

    await Question.deleteMany({});
    await Category.deleteMany({});
    console.log('Cleared existing categories and questions');

    await Category.insertMany(fixture.categories);
    await Question.insertMany(fixture.questions);

    // New questions continue after the highest seeded id.
    const maxId = fixture.questions.reduce((max, q) => Math.max(max, q.id), 0);
    await setSequence(QUESTION_SEQUENCE, maxId);

    console.log(`✓ Seeded ${fixture.categories.length} categories and ${fixture.questions.length} questions`);
    await disconnectDatabase();
    process.exit(0);
  } catch (error) {
    console.error('Error seeding database:', error);
    process.exit(1);
  }
}

void seedDatabase();
