export { RouteTable } from "./route-table";
