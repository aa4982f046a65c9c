import knexfile from '../../db/knexfile';
import { knex } from 'knex';

const database = knex(knexfile);

export default database;
