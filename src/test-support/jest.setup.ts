import 'reflect-metadata';
import { setLogLevel } from '../utils/logger.util';

setLogLevel('silent');
