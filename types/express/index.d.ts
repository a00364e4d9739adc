// types/express/index.d.ts

declare module "express-serve-static-core" {
  interface Request {
    admin?: {
      sub: string;
      email?: string;
    };
  }
}

export {};
