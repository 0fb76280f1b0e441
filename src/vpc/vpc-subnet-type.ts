export type VpcSubnetType = "public" | "private";
