export type Env = {
  ZEEBE_GATEWAY_ADDRESS: string;
  MONGO_URI: string;
  MONGO_DB_NAME: string;
};

const validateMongoUri = (name: string, value: string): string => {
  if (!/^mongodb(\+srv)?:\/\/\S+$/.test(value)) {
    throw new Error(`${name} must be a mongodb:// or mongodb+srv:// connection string. Received: ${value}`);
  }
  return value;
};

const validateGatewayAddress = (name: string, value: string): string => {
  const match = /^([^\s:/]+):(\d{1,5})$/.exec(value);
  const port = match ? Number(match[2]) : NaN;
  if (!match || port < 1 || port > 65535) {
    throw new Error(`${name} must be a host:port address. Received: ${value}`);
  }
  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const ZEEBE_GATEWAY_ADDRESS = validateGatewayAddress(
    "ZEEBE_GATEWAY_ADDRESS",
    env.ZEEBE_GATEWAY_ADDRESS?.trim() || "localhost:26500"
  );
  const MONGO_URI = validateMongoUri("MONGO_URI", env.MONGO_URI ?? "mongodb://localhost:27017/job-bridge");
  const MONGO_DB_NAME = env.MONGO_DB_NAME?.trim() || "job-bridge";

  return { ZEEBE_GATEWAY_ADDRESS, MONGO_URI, MONGO_DB_NAME };
};
