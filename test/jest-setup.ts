import 'reflect-metadata';

// Increase Jest's default timeout for specs that work on temp directories
jest.setTimeout(10000);
