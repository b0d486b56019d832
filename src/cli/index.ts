import dotenv from 'dotenv';
import { EXIT_ERROR, main } from './program';

dotenv.config();

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(error);
    process.exit(EXIT_ERROR);
  });
